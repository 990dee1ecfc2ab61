/**
 * @packageDocumentation ldapnav
 *
 * Application wiring: configuration, logger, controller, store and terminal.
 *
 * @example
 * const app = new LdapNav();
 *
 * await app.run();
 */
import type winston from 'winston';

import { loadConfig, resolveSettings, type Settings } from '../config/settings';
import type { Config } from '../config/args';
import { DirectoryClient } from '../lib/directoryClient';
import { errorMessage } from '../lib/errors';
import { buildLogger } from '../logger/winston';
import { createController, type Controller } from '../tui/store/controller';
import { Store } from '../tui/store/Store';
import { Terminal } from '../tui/terminal';
import { hitTest, render } from '../tui/render';
import type { AppState, Message, Zone } from '../tui/types';

export type { Config, Settings };
export { DirectoryClient } from '../lib/directoryClient';
export * from '../lib/errors';

/**
 * @class LdapNav
 */
export class LdapNav {
  config: Config;
  configFile?: string;
  settings: Settings;
  warnings: string[];
  logger: winston.Logger;
  controller: Controller;

  constructor(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env) {
    const loaded = loadConfig(argv, env);
    this.config = loaded.config;
    this.configFile = loaded.configFile;
    this.logger = buildLogger(this.config);
    const { settings, warnings } = resolveSettings(this.config);
    this.settings = settings;
    this.warnings = [...loaded.warnings, ...warnings];
    this.warnings.forEach(warning => this.logger.warn(`config: ${warning}`));
    if (this.configFile) this.logger.info(`Using configuration file ${this.configFile}`);

    this.controller = createController({
      logger: this.logger,
      connect: params =>
        DirectoryClient.connect(params, {
          logger: this.logger,
          cacheMax: this.settings.cacheMax,
          cacheTtl: this.settings.cacheTtl,
        }),
    });
  }

  /**
   * Resolves once the user quits and the connection is closed
   */
  run(): Promise<void> {
    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error(`Unhandled promise rejection: ${errorMessage(reason)}`);
    });

    return new Promise<void>((resolve, reject) => {
      let zones: Zone[] = [];
      let finished = false;
      // assigned once the terminal exists
      let store: Store<AppState, Message> | undefined;
      const dispatch = (message: Message): void => store?.dispatch(message);

      const terminal = new Terminal({
        onKey: key => dispatch({ type: 'key', key }),
        onPointer: (x, y) => {
          const target = hitTest(zones, x, y);
          if (target) dispatch({ type: 'activate', target });
        },
        onResize: (width, height) => dispatch({ type: 'resize', width, height }),
      });

      const { state, tasks } = this.controller.init({
        settings: this.settings,
        warnings: this.warnings,
        width: terminal.width,
        height: terminal.height,
      });
      const current = new Store<AppState, Message>(
        this.controller.update,
        state,
        {
          logger: this.logger,
          onTaskError: (label, err) => ({
            type: 'status',
            text: `Error: ${label}: ${errorMessage(err)}`,
          }),
        }
      );
      store = current;

      const draw = (): void => {
        const frame = render(current.getState());
        zones = frame.zones;
        terminal.draw(frame);
      };

      const finish = (client: DirectoryClient | null): void => {
        finished = true;
        terminal.destroy();
        if (!client) {
          this.logger.info('Exiting');
          resolve();
          return;
        }
        client
          .close()
          .then(() => {
            this.logger.info('Exiting');
            resolve();
          })
          .catch((err: unknown) => {
            this.logger.error(`Error while closing connection: ${errorMessage(err)}`);
            reject(err instanceof Error ? err : new Error(errorMessage(err)));
          });
      };

      current.subscribe(() => {
        if (finished) return;
        const next = current.getState();
        if (next.quitting) return finish(next.client);
        draw();
      });

      draw();
      current.schedule(tasks);
    });
  }
}
