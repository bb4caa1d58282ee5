import type { Logger } from "pino";
import type { ColumnGroup, FusionMode } from "./types.js";

/**
 * Module: Progress Events
 * Purpose: Typed progress reporting for fusion and synchronization. Stages emit events
 * into a caller-supplied sink; the CLI forwards them to pino, tests collect them.
 */
export type FusionEvent =
  | { type: "source.loaded"; source: string; path: string; rows: number }
  | { type: "source.missing"; source: string; path: string; fatal: boolean }
  | { type: "source.empty"; source: string; path: string; fatal: boolean }
  | { type: "mode.selected"; mode: FusionMode }
  | { type: "scrape.matched"; matched: number; fallback: number; unmatched: number }
  | { type: "columns.reconciled"; before: number; after: number; groups: ColumnGroup[] }
  | { type: "records.merged"; rowsIn: number; rowsOut: number; mergedGroups: number }
  | { type: "repeats.blanked"; cells: number }
  | { type: "workbook.written"; path: string; rows: number; columns: number }
  | { type: "sheet.header.read"; columns: number; rows: number }
  | { type: "sheet.header.widened"; added: string[] }
  | { type: "sheet.backfilled"; range: string; rows: number }
  | { type: "sheet.appended"; rows: number }
  | { type: "sheet.failed"; stage: string; code: string; reason: string };

export type EventSink = (event: FusionEvent) => void;

export const noopSink: EventSink = () => undefined;

const WARN_EVENTS = new Set<FusionEvent["type"]>(["source.missing", "source.empty", "sheet.failed"]);

export function loggerSink(logger: Logger): EventSink {
  return (event) => {
    const { type, ...data } = event;
    if (WARN_EVENTS.has(type)) logger.warn({ event: type, ...data }, type);
    else logger.info({ event: type, ...data }, type);
  };
}

export interface CollectingSink {
  sink: EventSink;
  events: FusionEvent[];
  ofType<T extends FusionEvent["type"]>(type: T): Array<Extract<FusionEvent, { type: T }>>;
}

export function collectingSink(): CollectingSink {
  const events: FusionEvent[] = [];
  return {
    events,
    sink: (event) => {
      events.push(event);
    },
    ofType<T extends FusionEvent["type"]>(type: T) {
      return events.filter((e): e is Extract<FusionEvent, { type: T }> => e.type === type);
    },
  };
}
