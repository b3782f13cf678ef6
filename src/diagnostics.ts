import type { ConfigSource, DiagnosticEvent } from "./types";

export class DiagnosticsCollector {
  private events: DiagnosticEvent[] = [];
  private depth = 0;
  private reloadStart = 0;

  /** Nested starts belong to the outermost reload in progress. */
  addReload(layer: string, phase: "start" | "done" | "failed"): void {
    if (phase === "start") {
      if (this.depth === 0) this.reloadStart = this.events.length;
      this.depth++;
    } else if (this.depth > 0) {
      this.depth--;
    }
    this.events.push({ type: "reload", layer, phase });
  }

  addSourceDecision(key: string, picked: ConfigSource, tried: string[]): void {
    this.events.push({ type: "sourceDecision", key, picked, tried });
  }

  addNote(message: string, meta?: Record<string, unknown>): void {
    const event: Extract<DiagnosticEvent, { type: "note" }> = { type: "note", message };
    if (meta !== undefined) {
      event.meta = meta;
    }
    this.events.push(event);
  }

  getEvents(): DiagnosticEvent[] {
    return [...this.events];
  }

  /** Events since the outermost reload started, or the last one that did. */
  getReloadEvents(): DiagnosticEvent[] {
    return this.events.slice(this.reloadStart);
  }

  clear(): void {
    this.events = [];
    this.depth = 0;
    this.reloadStart = 0;
  }
}
