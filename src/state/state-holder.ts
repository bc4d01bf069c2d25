import { config } from "../config";
import { logger as defaultLogger, type Logger } from "../logger";
import type { State } from "./state";

export type StateListener = (next: State, previous: State) => void;

/**
 * Current operating state. Written by an external classifier, read by every
 * decision; the engine never derives it from traffic.
 */
export class StateHolder {
  private state: State;
  private readonly listeners = new Set<StateListener>();

  constructor(
    initial: State = "NORMAL",
    private readonly logger: Logger = defaultLogger
  ) {
    this.state = initial;
  }

  currentState(): State {
    return this.state;
  }

  setState(next: State): void {
    const previous = this.state;
    this.state = next;
    if (previous === next) {
      return;
    }
    this.logger.info({ from: previous, to: next }, "Operating state changed");
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error({ error, from: previous, to: next }, "State listener failed");
      }
    }
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export const stateHolder = new StateHolder(config.initialState);
