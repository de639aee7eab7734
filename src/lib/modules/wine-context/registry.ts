import { v4 as uuidv4 } from "uuid";
import { UnknownContextError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { WineContext } from "./context.js";

const log = logger.child({ module: "context-registry" });

export interface RegisterOptions {
  /** Registry key; a UUID is generated when omitted */
  name?: string;
  /** Make this context the default one */
  default?: boolean;
}

/**
 * Named set of Wine contexts with at most one default.
 *
 * - The first context registered becomes the default.
 * - Re-registering a name replaces its binding but never moves the default.
 * - Every operation is synchronous, so reads never observe a half-applied
 *   write.
 */
export class ContextRegistry {
  private readonly contexts = new Map<string, WineContext>();
  private _default: string | null = null;

  register(context: WineContext, options: RegisterOptions = {}): string {
    const name = options.name ?? uuidv4();
    const replaced = this.contexts.has(name);
    this.contexts.set(name, context);

    if (options.default || this._default === null) {
      this._default = name;
    }

    log.debug({ name, replaced, default: this._default === name }, "Registered Wine context");
    return name;
  }

  /**
   * Removes a context. When it was the default, the earliest remaining
   * registration takes over, or the registry is left without a default.
   * Returns false when nothing was registered under `name`.
   */
  unregister(name: string): boolean {
    if (!this.contexts.delete(name)) return false;

    if (this._default === name) {
      const next = this.contexts.keys().next();
      this._default = next.done ? null : next.value;
    }
    log.debug({ name, default: this._default }, "Unregistered Wine context");
    return true;
  }

  /**
   * Returns the named context, or the default when `name` is omitted.
   * Throws UnknownContextError when nothing matches.
   */
  resolve(name?: string): WineContext {
    if (name !== undefined) {
      const context = this.contexts.get(name);
      if (!context) {
        throw new UnknownContextError(`No Wine context registered under "${name}"`, name);
      }
      return context;
    }

    const context = this._default === null ? undefined : this.contexts.get(this._default);
    if (!context) {
      throw new UnknownContextError("No default Wine context is registered", null);
    }
    return context;
  }

  get(name: string): WineContext | undefined {
    return this.contexts.get(name);
  }

  has(name: string): boolean {
    return this.contexts.has(name);
  }

  setDefault(name: string): void {
    if (!this.contexts.has(name)) {
      throw new UnknownContextError(`No Wine context registered under "${name}"`, name);
    }
    this._default = name;
  }

  get defaultName(): string | null {
    return this._default;
  }

  names(): string[] {
    return Array.from(this.contexts.keys());
  }

  get size(): number {
    return this.contexts.size;
  }

  clear(): void {
    this.contexts.clear();
    this._default = null;
  }
}

/** Process-wide registry used when callers do not pass their own. */
export const defaultRegistry = new ContextRegistry();

export function registerContext(context: WineContext, options?: RegisterOptions): string {
  return defaultRegistry.register(context, options);
}

export function resolveContext(name?: string): WineContext {
  return defaultRegistry.resolve(name);
}
