/**
 * Per-invocation execution contexts.
 *
 * A context is the only channel through which steps share data. The
 * pipeline creates one for every call, seeds it with the request (or
 * command), hands it to each step in turn and to response assembly, and
 * drops it when the call returns.
 *
 * Entries are addressed through typed keys:
 *
 * ```ts
 * const USER = contextKey<User>('user');
 * context.put(USER, user);
 * const found = context.get(USER); // User | undefined
 * ```
 *
 * Keys are matched by name, so two modules that agree on a name share the
 * entry. The type parameter is what keeps `put` and `get` honest at
 * compile time.
 */

// ---------------------------------------------------------------------------
// Context keys
// ---------------------------------------------------------------------------

/** A named slot in an execution context, typed by the value it holds. */
export interface ContextKey<T> {
  readonly name: string;
  /** Phantom member tying the key to its value type. Never set. */
  readonly __valueType?: (value: T) => T;
}

/** Reserved key names the pipelines seed before validation. */
export const RESERVED_KEYS = {
  REQUEST: 'request',
  COMMAND: 'command',
} as const;

const RESERVED_NAMES: ReadonlySet<string> = new Set(Object.values(RESERVED_KEYS));

/**
 * Create a typed context key.
 *
 * @throws TypeError for an empty name or a reserved name.
 */
export function contextKey<T>(name: string): ContextKey<T> {
  if (name.length === 0) {
    throw new TypeError('Context key name must be non-empty');
  }
  if (RESERVED_NAMES.has(name)) {
    throw new TypeError(`Context key name "${name}" is reserved`);
  }
  return Object.freeze({ name });
}

/** Thrown by `require()` when a step reads a key nobody has written. */
export class MissingContextValueError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`No value in execution context for key "${key}"`);
    this.name = 'MissingContextValueError';
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// ExecutionContext
// ---------------------------------------------------------------------------

export class ExecutionContext<TRequest = unknown> {
  /** The original request (or command) this invocation was started with. */
  readonly request: TRequest;
  /** Epoch milliseconds at which the context was created. */
  readonly startedAt: number;

  private readonly store = new Map<string, unknown>();

  constructor(request: TRequest, requestKey: string = RESERVED_KEYS.REQUEST) {
    this.request = request;
    this.startedAt = Date.now();
    this.store.set(requestKey, request);
  }

  put<T>(key: ContextKey<T>, value: T): void {
    this.store.set(key.name, value);
  }

  /** Returns `undefined` for a missing key; never throws. */
  get<T>(key: ContextKey<T>): T | undefined {
    const entry = this.read(key);
    return entry.found ? entry.value : undefined;
  }

  getOrDefault<T>(key: ContextKey<T>, fallback: T): T {
    const entry = this.read(key);
    return entry.found ? entry.value : fallback;
  }

  /**
   * Read a value a previous step must have written.
   *
   * @throws MissingContextValueError when the key is absent.
   */
  require<T>(key: ContextKey<T>): T {
    const entry = this.read(key);
    if (!entry.found) {
      throw new MissingContextValueError(key.name);
    }
    return entry.value;
  }

  has<T>(key: ContextKey<T>): boolean {
    return this.store.has(key.name);
  }

  /** Remove an entry and return its previous value, if any. */
  remove<T>(key: ContextKey<T>): T | undefined {
    const entry = this.read(key);
    this.store.delete(key.name);
    return entry.found ? entry.value : undefined;
  }

  /**
   * Drop every entry, the seeded request entry included. The `request`
   * property keeps pointing at the original request.
   */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  /** Milliseconds since the context was created. */
  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  // Entries are only written through put(), which ties each value to its
  // key's type parameter.
  private read<T>(key: ContextKey<T>): { found: true; value: T } | { found: false } {
    if (!this.store.has(key.name)) {
      return { found: false };
    }
    return { found: true, value: this.store.get(key.name) as T };
  }
}

// ---------------------------------------------------------------------------
// CommandContext
// ---------------------------------------------------------------------------

/** Something that happened during a command, published after commit. */
export interface CommandEvent {
  type: string;
  [field: string]: unknown;
}

/** Who started a command, from where, when, and in which transaction. */
export interface AuditInfo {
  actorId?: string;
  source?: string;
  initiatedAt: string;
  transactionId?: string;
  [field: string]: unknown;
}

const PIPELINE_OWNED_AUDIT_FIELDS: ReadonlySet<string> = new Set(['initiatedAt', 'transactionId']);

/**
 * Context for command (write) invocations. Adds the audit namespace and
 * the ordered, append-only event list to the base context. The command is
 * stored under the reserved `"command"` key and is also the context's
 * `request`, so query steps can run unchanged inside command pipelines.
 */
export class CommandContext<TCommand = unknown> extends ExecutionContext<TCommand> {
  private readonly audit: AuditInfo;
  private readonly events: CommandEvent[] = [];

  constructor(command: TCommand) {
    super(command, RESERVED_KEYS.COMMAND);
    this.audit = { initiatedAt: new Date(this.startedAt).toISOString() };
  }

  get command(): TCommand {
    return this.request;
  }

  get transactionId(): string | undefined {
    return this.audit.transactionId;
  }

  setTransactionId(transactionId: string): void {
    this.audit.transactionId = transactionId;
  }

  setActor(actorId: string): void {
    this.audit.actorId = actorId;
  }

  setSource(source: string): void {
    this.audit.source = source;
  }

  /**
   * Merge extra audit fields. `initiatedAt` and `transactionId` are owned
   * by the context and the pipeline; they are never overwritten here.
   */
  addAuditInfo(fields: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(fields)) {
      if (PIPELINE_OWNED_AUDIT_FIELDS.has(key)) continue;
      this.audit[key] = value;
    }
  }

  /** Snapshot of the audit namespace. */
  getAuditInfo(): AuditInfo {
    return { ...this.audit };
  }

  addEvent(event: CommandEvent): void {
    this.events.push(event);
  }

  /** Snapshot of the events appended so far, in order. */
  getEvents(): readonly CommandEvent[] {
    return [...this.events];
  }
}
