/**
 * Message store (Redux-like pattern with background tasks)
 *
 * `update` is the only place state changes. Messages are processed one at a
 * time: a message dispatched while another is being handled waits in the
 * queue. Tasks returned by `update` run in the background and their result
 * is dispatched back.
 */
import type winston from 'winston';

import { errorMessage } from '../../lib/errors';
import type { Task } from '../types';

export type Listener = () => void;

export type Update<S, M> = (
  state: S,
  message: M
) => { state: S; tasks: Task<M>[] };

export interface StoreOptions<M> {
  logger?: winston.Logger;
  // message to dispatch when a task rejects
  onTaskError: (label: string, err: unknown) => M;
}

export class Store<S, M> {
  private state: S;
  private update: Update<S, M>;
  private listeners: Set<Listener> = new Set();
  private queue: M[] = [];
  private draining = false;
  private running: Set<Promise<void>> = new Set();
  private options: StoreOptions<M>;

  constructor(update: Update<S, M>, initialState: S, options: StoreOptions<M>) {
    this.update = update;
    this.state = initialState;
    this.options = options;
  }

  getState(): S {
    return this.state;
  }

  dispatch(message: M): void {
    this.queue.push(message);
    if (this.draining) return;
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    // Return unsubscribe function
    return () => this.listeners.delete(listener);
  }

  schedule(tasks: Task<M>[]): void {
    tasks.forEach(task => this.spawn(task));
  }

  /**
   * Resolves once no task is running, including tasks spawned meanwhile
   */
  async settled(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  get pending(): number {
    return this.running.size;
  }

  private process(message: M): void {
    const prevState = this.state;
    const { state, tasks } = this.update(this.state, message);
    this.state = state;

    // Only notify if state actually changed
    if (prevState !== this.state) {
      this.listeners.forEach(listener => listener());
    }
    this.schedule(tasks);
  }

  private spawn(task: Task<M>): void {
    const { logger, onTaskError } = this.options;
    let timer: NodeJS.Timeout | undefined;
    if (task.timeoutMs !== undefined && task.onTimeout) {
      const onTimeout = task.onTimeout;
      timer = setTimeout(() => {
        timer = undefined;
        logger?.warn(`${task.label}: timed out after ${task.timeoutMs}ms`);
        this.dispatch(onTimeout());
      }, task.timeoutMs);
    }
    const stopTimer = (): void => {
      if (timer) clearTimeout(timer);
      timer = undefined;
    };

    logger?.debug(`task started: ${task.label}`);
    const running: Promise<void> = task
      .run()
      .then(
        message => {
          stopTimer();
          this.dispatch(message);
        },
        (err: unknown) => {
          stopTimer();
          logger?.error(`${task.label} failed: ${errorMessage(err)}`);
          this.dispatch(onTaskError(task.label, err));
        }
      )
      .finally(() => {
        this.running.delete(running);
      });
    this.running.add(running);
  }
}
