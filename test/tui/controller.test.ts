import { setTimeout as delay } from 'node:timers/promises';

import { expect } from 'chai';

import { DirectoryClient } from '../../src/lib/directoryClient';
import { errorMessage } from '../../src/lib/errors';
import type { Settings } from '../../src/config/settings';
import { silentLogger } from '../../src/logger/winston';
import { createController } from '../../src/tui/store/controller';
import { Store } from '../../src/tui/store/Store';
import { loadingTimerTask, type Connect } from '../../src/tui/store/tasks';
import type { AppState, Message, Target } from '../../src/tui/types';
import {
  BASE_DN,
  FakeDirectory,
  connectionParams,
  recordSleep,
} from '../helpers/fakeDirectory';
import { testSettings } from '../helpers/settings';

const PEOPLE = `ou=people,${BASE_DN}`;
const ALICE = `uid=alice,${PEOPLE}`;

interface Harness {
  directory: FakeDirectory;
  store: Store<AppState, Message>;
  state: () => AppState;
  press: (...keys: string[]) => Promise<void>;
  activate: (target: Target) => Promise<void>;
}

function setup(
  overrides: Partial<Settings> = {},
  wrap: (connect: Connect) => Connect = connect => connect
): Harness {
  const directory = new FakeDirectory();
  const logger = silentLogger();
  const connect: Connect = params =>
    DirectoryClient.connect(params, {
      logger,
      transportFactory: directory.factory,
      sleep: recordSleep().sleep,
    });
  const controller = createController({ connect: wrap(connect), logger });
  const { state, tasks } = controller.init({
    settings: testSettings(overrides),
    warnings: [],
    width: 80,
    height: 24,
  });
  const store = new Store<AppState, Message>(controller.update, state, {
    logger,
    onTaskError: (label, err) => ({
      type: 'status',
      text: `Error: ${label}: ${errorMessage(err)}`,
    }),
  });
  store.schedule(tasks);
  return {
    directory,
    store,
    state: () => store.getState(),
    press: async (...keys) => {
      keys.forEach(key => store.dispatch({ type: 'key', key }));
      await store.settled();
    },
    activate: async target => {
      store.dispatch({ type: 'activate', target });
      await store.settled();
    },
  };
}

// focus the Connect button and press it
const CONNECT = ['end', 'enter'];

describe('Application controller', () => {
  describe('start view', () => {
    it('should start disconnected on the start view', () => {
      const { state } = setup();
      expect(state().view).to.equal('start');
      expect(state().status).to.equal('Ready');
      expect(state().client).to.equal(null);
      expect(state().start.form.host).to.equal('localhost');
    });

    it('should not switch to views that need a connection', async () => {
      const { state, press } = setup();
      await press('2', '4', 'tab');
      expect(state().view).to.equal('start');
    });

    it('should edit a text field', async () => {
      const { state, press } = setup();
      await press('enter');
      expect(state().start.editing).to.be.true;
      expect(state().start.draft).to.equal('localhost');
      await press('ctrl+u', 'l', 'd', 'a', 'q', 'backspace', 'p', 'enter');
      expect(state().start.editing).to.be.false;
      expect(state().start.form.host).to.equal('ldap');
    });

    it('should keep editing an invalid value', async () => {
      const { state, press } = setup();
      await press('down', 'enter', 'ctrl+u', '9', '9', '9', '9', '9', 'enter');
      expect(state().start.editing).to.be.true;
      expect(state().start.error).to.equal('Port must be a number between 1 and 65535');
      expect(state().status).to.equal('Port must be a number between 1 and 65535');
      await press('esc');
      expect(state().start.editing).to.be.false;
      expect(state().start.error).to.equal(null);
      expect(state().start.form.port).to.equal('389');
    });

    it('should toggle a field on click', async () => {
      const { state, activate } = setup();
      await activate({ kind: 'field', index: 3 });
      expect(state().start.focus).to.equal(3);
      expect(state().start.form.useSSL).to.be.true;
      expect(state().start.form.port).to.equal('636');
    });

    it('should quit with q unless typing', async () => {
      const { state, press } = setup();
      await press('enter', 'q');
      expect(state().quitting).to.be.false;
      expect(state().start.draft).to.equal('localhostq');
      await press('esc', 'q');
      expect(state().quitting).to.be.true;
    });
  });

  describe('connection', () => {
    it('should connect and load the tree', async () => {
      const { state, press, directory } = setup();
      await press(...CONNECT);
      expect(state().view).to.equal('tree');
      expect(state().client?.params.host).to.equal('localhost');
      expect(state().start.connecting).to.be.false;
      expect(state().status).to.equal('Tree loaded');
      expect(state().tree.model?.items.map(i => i.node.name)).to.deep.equal([
        BASE_DN,
        'ou=people',
        'ou=groups',
      ]);
      expect(directory.opened).to.have.length(1);
    });

    it('should connect at startup when asked to', async () => {
      const { state, store } = setup({ autoConnect: true });
      expect(state().start.connecting).to.be.true;
      await store.settled();
      expect(state().view).to.equal('tree');
    });

    it('should ignore keys while connecting, except Esc', async () => {
      const { state, store, directory } = setup();
      ['end', 'enter', 'up', 'q'].forEach(key => store.dispatch({ type: 'key', key }));
      expect(state().start.focus).to.equal(8);
      expect(state().quitting).to.be.false;
      store.dispatch({ type: 'key', key: 'esc' });
      expect(state().status).to.equal('Connection cancelled');
      await store.settled();
      // the abandoned connection is closed when it completes
      expect(state().client).to.equal(null);
      expect(state().view).to.equal('start');
      expect(directory.opened[0].closed).to.be.true;
    });

    it('should report a failed connection', async () => {
      const { state, press } = setup({
        bindUser: `cn=admin,${BASE_DN}`,
        bindPassword: 'wrong',
      });
      await press(...CONNECT);
      expect(state().view).to.equal('start');
      expect(state().start.connecting).to.be.false;
      expect(state().start.error).to.equal('Invalid credentials');
      expect(state().status).to.equal('Connection failed: Invalid credentials');
    });

    it('should time out a slow connection and close it once established', async () => {
      const { state, press, directory } = setup(
        { connectTimeoutMs: 5 },
        connect => async params => {
          await delay(30);
          return connect(params);
        }
      );
      await press(...CONNECT);
      expect(state().start.error).to.equal('Connection timeout after 0.005 seconds');
      expect(state().client).to.equal(null);
      expect(directory.opened[0].closed).to.be.true;
    });

    it('should reject an invalid form without connecting', async () => {
      const { state, press, directory } = setup({ host: '' });
      await press(...CONNECT);
      expect(state().start.error).to.equal('Host is required');
      expect(state().status).to.equal('Error: Host is required');
      expect(directory.opened).to.have.length(0);
    });
  });

  describe('tree view', () => {
    it('should expand and collapse nodes', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('down', 'right');
      expect(state().status).to.equal(`Loaded 5 children for ${PEOPLE}`);
      expect(state().tree.expanding).to.deep.equal([]);
      expect(state().tree.model?.items).to.have.length(8);

      await press('right');
      expect(state().status).to.equal('Node already expanded');

      await press('left');
      expect(state().status).to.equal('Node collapsed');
      expect(state().tree.model?.items).to.have.length(3);
      expect(state().tree.model?.cursor).to.equal(1);
    });

    it('should report a leaf without children', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('down', 'right');
      await press('down', 'right');
      expect(state().status).to.equal('No children to expand');
      await press('right');
      expect(state().status).to.equal('No children to expand');
      await press('left');
      expect(state().status).to.equal('No children to collapse');
    });

    it('should open the selected entry in the record view', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('down', 'right');
      await press('down', 'enter');
      expect(state().view).to.equal('record');
      expect(state().status).to.equal(`Loaded ${ALICE}`);
      expect(state().record.entry?.dn).to.equal(ALICE);
      await press('end');
      expect(state().record.cursor).to.equal(2);
    });

    it('should open an entry on click', async () => {
      const { state, press, activate } = setup();
      await press(...CONNECT);
      await activate({ kind: 'treeRow', index: 2 });
      expect(state().view).to.equal('record');
      expect(state().record.entry?.dn).to.equal(`ou=groups,${BASE_DN}`);
    });

    it('should drop results of a client that is not current', async () => {
      const { state, press, store, directory } = setup();
      await press(...CONNECT);
      const other = await DirectoryClient.connect(connectionParams(), {
        logger: silentLogger(),
        transportFactory: directory.factory,
      });
      const before = state();
      store.dispatch({ type: 'treeLoaded', client: other, root: other.buildTree() });
      expect(state()).to.equal(before);
    });

    it('should resize the tree viewport', async () => {
      const { state, press, store } = setup();
      await press(...CONNECT);
      store.dispatch({ type: 'resize', width: 100, height: 10 });
      expect(state().width).to.equal(100);
      expect(state().tree.model?.height).to.equal(5);
    });
  });

  describe('view switching', () => {
    it('should cycle through enabled views', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('tab');
      expect(state().view).to.equal('query');
      await press('shift+tab');
      expect(state().view).to.equal('tree');
      await press('1');
      expect(state().view).to.equal('start');
    });

    it('should switch view on a tab click', async () => {
      const { state, press, activate } = setup();
      await press(...CONNECT);
      await activate({ kind: 'tab', view: 'query' });
      expect(state().view).to.equal('query');
    });
  });

  describe('query view', () => {
    const filter = '(objectClass=person)';

    it('should run a query and page through the results', async () => {
      const { state, press } = setup({ pageSize: 2 });
      await press(...CONNECT);
      await press('4', 'ctrl+u', ...filter, 'enter');
      expect(state().query.session.mode).to.equal('browse');
      expect(state().query.session.results).to.have.length(2);
      expect(state().status).to.equal('Found 2 results, press [N] for more');

      await press('n');
      await press('N');
      expect(state().query.session.results).to.have.length(5);
      expect(state().status).to.equal('Found 5 results');

      const before = state();
      await press('n');
      expect(state()).to.equal(before);
    });

    it('should keep a single fetch in flight when Enter is pressed twice', async () => {
      const { state, press, directory } = setup({ pageSize: 2 });
      await press(...CONNECT);
      await press('4');
      const searches = directory.searches;
      await press('enter', 'enter');
      expect(directory.searches).to.equal(searches + 1);
      expect(state().query.session.generation).to.equal(1);
      expect(state().query.session.results).to.have.length(2);
    });

    it('should open a result', async () => {
      const { state, press } = setup({ pageSize: 2 });
      await press(...CONNECT);
      await press('4', 'ctrl+u', ...filter, 'enter');
      await press('down', 'enter');
      expect(state().view).to.equal('record');
      expect(state().record.entry?.dn).to.equal(`uid=bob,${PEOPLE}`);
    });

    it('should go back to the filter on Esc', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('4', 'enter');
      expect(state().query.session.mode).to.equal('browse');
      await press('esc');
      expect(state().status).to.equal('Query cleared');
      expect(state().query.session.mode).to.equal('input');
      expect(state().query.session.results).to.deep.equal([]);
    });

    it('should reject an empty filter', async () => {
      const { state, press, directory } = setup();
      await press(...CONNECT);
      await press('4');
      const searches = directory.searches;
      await press('ctrl+u', 'enter');
      expect(state().query.error).to.equal('Filter is empty');
      expect(state().status).to.equal('Error: Filter is empty');
      expect(directory.searches).to.equal(searches);
    });

    it('should report a filter the server rejects', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('4', 'ctrl+u', ...'(uid', 'enter');
      expect(state().query.error).to.equal('Bad search filter: (uid');
      expect(state().status).to.equal('Error: Bad search filter: (uid');
      expect(state().query.session.pending).to.be.false;
    });

    it('should treat q and digits as filter text', async () => {
      const { state, press } = setup();
      await press(...CONNECT);
      await press('4', 'ctrl+u', 'q', '1');
      expect(state().quitting).to.be.false;
      expect(state().view).to.equal('query');
      expect(state().query.session.filter).to.equal('q1');
    });
  });

  describe('tree loading timer', () => {
    const logger = silentLogger();
    const controller = createController({
      logger,
      connect: () => Promise.reject(new Error('not used')),
    });

    const loading = async () => {
      const client = await DirectoryClient.connect(connectionParams(), {
        logger,
        transportFactory: new FakeDirectory().factory,
      });
      const { state, tasks } = controller.init({
        client,
        settings: testSettings(),
        warnings: [],
        width: 80,
        height: 24,
      });
      return { client, state, tasks };
    };

    const tick = (loadId: number, now: number): Message => ({
      type: 'loadingTick',
      loadId,
      startedAt: 1000,
      now,
    });

    it('should start a timer with the root load', async () => {
      const { state, tasks } = await loading();
      expect(state.tree.loading).to.be.true;
      expect(state.tree.loadId).to.equal(1);
      expect(state.tree.elapsedMs).to.equal(0);
      expect(tasks.map(t => t.label)).to.deep.equal([
        `load tree ${BASE_DN}`,
        'loading timer #1',
      ]);
    });

    it('should record the elapsed time and keep ticking while loading', async () => {
      const { state } = await loading();
      const next = controller.update(state, tick(1, 1350));
      expect(next.state.tree.elapsedMs).to.equal(350);
      expect(next.tasks.map(t => t.label)).to.deep.equal(['loading timer #1']);
    });

    it('should stop ticking once the tree is loaded', async () => {
      const { client, state } = await loading();
      const loaded = controller.update(state, {
        type: 'treeLoaded',
        client,
        root: client.buildTree(),
      }).state;
      const next = controller.update(loaded, tick(1, 1200));
      expect(next.state).to.equal(loaded);
      expect(next.tasks).to.deep.equal([]);
    });

    it('should stop ticking when the load fails', async () => {
      const { client, state } = await loading();
      const failed = controller.update(state, {
        type: 'error',
        client,
        scope: 'tree',
        error: 'Server unavailable',
      }).state;
      expect(controller.update(failed, tick(1, 1200)).tasks).to.deep.equal([]);
    });

    it('should drop ticks of an earlier load', async () => {
      const { state } = await loading();
      const reloaded = controller.update(state, { type: 'key', key: 'r' });
      expect(reloaded.state.tree.loadId).to.equal(2);
      const next = controller.update(reloaded.state, tick(1, 1200));
      expect(next.state).to.equal(reloaded.state);
      expect(next.tasks).to.deep.equal([]);
    });

    it('should report the time since the first tick started', async () => {
      const times = [10, 130];
      const task = loadingTimerTask(4, null, () => times.shift() ?? 0);
      expect(await task.run()).to.deep.equal({
        type: 'loadingTick',
        loadId: 4,
        startedAt: 10,
        now: 130,
      });
    });
  });
});
