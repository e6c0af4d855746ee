import PQueue from "p-queue";
import { describeError, isInvalidGrantError } from "../errors.js";
import { ACTION_NAMES } from "../player/dispatcher.js";
import type { PlayerAction } from "../types.js";
import { error, info, warn } from "../utils/log.js";

export const DEFAULT_MAX_PENDING = 16;

export type ActionSource = "keyboard" | "media-key";

export type ActionRunner = (action: PlayerAction) => Promise<void>;

/**
 * Single consumer for every input producer. Actions run strictly one at a
 * time in arrival order; failures are reported and never stop the queue.
 */
export class ActionQueue {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly run: ActionRunner;
  private readonly maxPending: number;
  private closed = false;

  constructor(run: ActionRunner, options?: { maxPending?: number }) {
    this.run = run;
    this.maxPending = options?.maxPending ?? DEFAULT_MAX_PENDING;
  }

  enqueue(action: PlayerAction, source: ActionSource) {
    const name = ACTION_NAMES[action];
    if (this.closed) {
      return false;
    }
    if (this.queue.size >= this.maxPending) {
      warn(`Dropping ${name}: ${this.queue.size} actions already waiting.`);
      return false;
    }
    info(source === "media-key" ? `Media key: ${name}` : `Executing: ${name}`);
    void this.queue.add(() => this.execute(action));
    return true;
  }

  private async execute(action: PlayerAction) {
    try {
      await this.run(action);
    } catch (err) {
      error(`Error executing ${ACTION_NAMES[action]}: ${describeError(err)}`);
      if (isInvalidGrantError(err)) {
        error("Run `spotkey login` to re-authenticate.");
      }
    }
  }

  close() {
    this.closed = true;
  }

  async drain() {
    await this.queue.onIdle();
  }
}
