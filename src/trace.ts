import type { ConstructionEvent, EventKind } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type DiagnosticKind =
  | EventKind
  | "demangle_unavailable"
  | "resolution"
  | "construction_failed";

/**
 * A structured message handed to every sink.
 *
 * `kind`, `typeName` and `payload` carry the machine-readable part; `message`
 * is a rendered line for humans.
 */
export type DiagnosticEvent = {
  level: LogLevel;
  namespace: string;
  kind: DiagnosticKind;
  message: string;
  typeName?: string;
  payload?: string;
  createdAt: string;
};

export type DiagnosticDetail = {
  kind: DiagnosticKind;
  typeName?: string;
  payload?: string;
};

export interface DiagnosticSink {
  emit(event: DiagnosticEvent): void;
}

export class MemorySink implements DiagnosticSink {
  private events: DiagnosticEvent[] = [];

  emit(event: DiagnosticEvent) {
    this.events.push(event);
  }

  read(): readonly DiagnosticEvent[] {
    return this.events;
  }

  ofKind(kind: DiagnosticKind): readonly DiagnosticEvent[] {
    return this.events.filter((e) => e.kind === kind);
  }

  clear() {
    this.events = [];
  }
}

export class ConsoleSink implements DiagnosticSink {
  emit(event: DiagnosticEvent) {
    const line = `[${event.namespace}] ${event.message}`;
    if (event.level === "error") console.error(line);
    else if (event.level === "warn") console.warn(line);
    else console.log(line);
  }
}

export const defaultNamespace = "cell-trace";

/**
 * Leveled logger fanning structured events out to sinks.
 *
 * Events below `level` are dropped before any sink sees them.
 */
export class Diagnostics {
  private sinks: DiagnosticSink[];

  constructor(
    private readonly level: LogLevel = "info",
    sinks: DiagnosticSink[] = [],
    private readonly namespace: string = defaultNamespace,
  ) {
    this.sinks = sinks;
  }

  withSink(sink: DiagnosticSink): this {
    this.sinks = [...this.sinks, sink];
    return this;
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, detail: DiagnosticDetail): void {
    this.emit("debug", message, detail);
  }

  info(message: string, detail: DiagnosticDetail): void {
    this.emit("info", message, detail);
  }

  warn(message: string, detail: DiagnosticDetail): void {
    this.emit("warn", message, detail);
  }

  error(message: string, detail: DiagnosticDetail): void {
    this.emit("error", message, detail);
  }

  private emit(level: LogLevel, message: string, detail: DiagnosticDetail) {
    if (!this.enabled(level)) return;
    const event: DiagnosticEvent = {
      level,
      namespace: this.namespace,
      message,
      ...detail,
      createdAt: new Date().toISOString(),
    };
    for (const sink of this.sinks) sink.emit(event);
  }
}

/**
 * Renders an event as the line a cell prints when it is built.
 *
 * @example
 * ```ts
 * describeEvent({ kind: "copy", typeName: "double", payload: "1.3" });
 * // "Copy constructor of InstrumentedCell<double> with value 1.3"
 * ```
 */
export function describeEvent(event: ConstructionEvent): string {
  const owner = `InstrumentedCell<${event.typeName}>`;
  if (event.kind === "default") return `Default constructor of ${owner}`;
  if (event.kind === "value_init")
    return `Parameterized constructor of ${owner}`;
  return `Copy constructor of ${owner} with value ${event.payload ?? ""}`;
}

/**
 * Ordered, append-only record of cell constructions.
 *
 * Appended events are frozen and forwarded to diagnostics at `info`.
 * There is no eviction.
 */
export class TraceLog {
  private readonly entries: ConstructionEvent[] = [];

  constructor(private readonly diagnostics?: Diagnostics) {}

  record(event: ConstructionEvent): ConstructionEvent {
    const frozen = Object.freeze({ ...event });
    this.entries.push(frozen);
    this.diagnostics?.info(describeEvent(frozen), {
      kind: frozen.kind,
      typeName: frozen.typeName,
      payload: frozen.payload,
    });
    return frozen;
  }

  get size(): number {
    return this.entries.length;
  }

  events(): readonly ConstructionEvent[] {
    return this.entries;
  }

  /** Events appended after `mark`, a previous value of {@link size}. */
  since(mark: number): readonly ConstructionEvent[] {
    return this.entries.slice(mark);
  }

  count(kind: EventKind): number {
    return this.entries.filter((e) => e.kind === kind).length;
  }
}
