import { RegistryError } from "./errors";
import type { ActionHandler, ActionRegistryOptions, DuplicatePolicy, HandlerResolver } from "./types";

/**
 * Routes action identifiers to handlers. Registration happens at startup;
 * after `freeze()` the registry is read-only and safe to share across runs.
 */
export class ActionRegistry implements HandlerResolver {
  private readonly handlers = new Map<string, ActionHandler>();
  private readonly onDuplicate: DuplicatePolicy;
  private frozen = false;

  constructor({ onDuplicate = "reject" }: ActionRegistryOptions = {}) {
    this.onDuplicate = onDuplicate;
  }

  register(action: string, handler: ActionHandler): this {
    if (this.frozen) {
      throw new RegistryError("registry_frozen", `Cannot register ${action}: registry is frozen`);
    }
    if (this.handlers.has(action) && this.onDuplicate === "reject") {
      throw new RegistryError("duplicate_action", `Handler already registered for ${action}`);
    }
    this.handlers.set(action, handler);
    return this;
  }

  resolve(action: string): ActionHandler | undefined {
    return this.handlers.get(action);
  }

  has(action: string): boolean {
    return this.handlers.has(action);
  }

  actions(): string[] {
    return [...this.handlers.keys()].sort();
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

export * from "./errors";
export * from "./retry";
export type * from "./types";
