/**
 * Trace events: the generator's record of what it did and why.
 *
 * Stage ids are dotted, e.g. "builder.attempt". Narrow on `eventType`.
 */

interface TraceEventBase {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly stageId: string;
}

export interface StartEvent extends TraceEventBase {
  readonly eventType: "start";
}

export interface EndEvent extends TraceEventBase {
  readonly eventType: "end";
  readonly data: { readonly durationMs: number };
}

export interface DecisionEvent extends TraceEventBase {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly string[];
    readonly chosen: string;
    readonly reason: string;
  };
}

export interface WarningEvent extends TraceEventBase {
  readonly eventType: "warning";
  readonly data: { readonly message: string };
}

export type TraceEvent = StartEvent | EndEvent | DecisionEvent | WarningEvent;

export type TraceEventType = TraceEvent["eventType"];

export interface TraceCollector {
  readonly enabled: boolean;
  start(stageId: string): void;
  end(stageId: string, durationMs: number): void;
  decision(
    stageId: string,
    question: string,
    options: readonly string[],
    chosen: string,
    reason: string,
  ): void;
  warning(stageId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}
