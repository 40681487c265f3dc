/**
 * Filter observability events.
 *
 * `Filter.apply` emits typed events around each traversal pass for
 * logging and timing.
 */

// ---------- Event Types ----------

export interface FilterStartedEvent {
  type: "FilterStarted";
  passCount: number;
  format: string;
  timestamp: string;
}

export interface PassStartedEvent {
  type: "PassStarted";
  index: number;
  label: string;
  timestamp: string;
}

export interface PassCompletedEvent {
  type: "PassCompleted";
  index: number;
  label: string;
  duration: number;
  timestamp: string;
}

export interface FilterCompletedEvent {
  type: "FilterCompleted";
  duration: number;
  timestamp: string;
}

export interface FilterFailedEvent {
  type: "FilterFailed";
  index: number;
  error: string;
  duration: number;
  timestamp: string;
}

export type FilterEvent =
  | FilterStartedEvent
  | PassStartedEvent
  | PassCompletedEvent
  | FilterCompletedEvent
  | FilterFailedEvent;

// ---------- Event Emitter ----------

export type FilterEventListener = (event: FilterEvent) => void;

export class FilterEventEmitter {
  private listeners: FilterEventListener[] = [];

  /** Register an event listener. */
  on(listener: FilterEventListener): void {
    this.listeners.push(listener);
  }

  /** Remove an event listener. */
  off(listener: FilterEventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  /** Emit an event to all listeners. */
  emit(event: FilterEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Remove all listeners. */
  clear(): void {
    this.listeners = [];
  }

  emitFilterStarted(passCount: number, format: string): void {
    this.emit({
      type: "FilterStarted",
      passCount,
      format,
      timestamp: new Date().toISOString(),
    });
  }

  emitPassStarted(index: number, label: string): void {
    this.emit({
      type: "PassStarted",
      index,
      label,
      timestamp: new Date().toISOString(),
    });
  }

  emitPassCompleted(index: number, label: string, duration: number): void {
    this.emit({
      type: "PassCompleted",
      index,
      label,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitFilterCompleted(duration: number): void {
    this.emit({
      type: "FilterCompleted",
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitFilterFailed(index: number, error: string, duration: number): void {
    this.emit({
      type: "FilterFailed",
      index,
      error,
      duration,
      timestamp: new Date().toISOString(),
    });
  }
}
