/**
 * Table of available actions, built explicitly at startup.
 */

import { InvalidInput, InvalidState } from "../lib/errors.js";
import type { Action } from "./model.js";

export class ActionRegistry {
  private readonly actions = new Map<string, Action>();

  constructor(actions: Iterable<Action> = []) {
    for (const action of actions) {
      this.register(action);
    }
  }

  register(...actions: Action[]): this {
    for (const action of actions) {
      if (this.actions.has(action.name)) {
        throw new InvalidState(`Duplicate action name: ${action.name}`);
      }
      this.actions.set(action.name, action);
    }
    return this;
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  lookup(name: string): Action {
    const action = this.actions.get(name);
    if (!action) {
      throw new InvalidInput(`Action not found: ${name}`);
    }
    return action;
  }

  /** All actions sorted by name. */
  list(): Action[] {
    return [...this.actions.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /** The action that fills in metadata for URL resources, if one is registered. */
  metadataFetcher(): Action | undefined {
    return this.list().find((action) => action.fetchesMetadata);
  }
}
