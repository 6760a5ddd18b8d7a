import { describeError } from "../errors";
import { createLogger } from "../logging/logger";

const logger = createLogger("sinks");

export type NotificationCallback = (message: string, detailJson: string) => void | Promise<void>;

export interface EventSink<E> {
  onEvent(event: E): void | Promise<void>;
}

type Registration<E> = { kind: "raw"; callback: NotificationCallback } | { kind: "event"; sink: EventSink<E> };

/**
 * Sinks registered for one notification source. A failing sink is logged
 * and does not keep the others from running.
 */
export class SinkRegistry<E> {
  private label: string;
  private parse: (message: string, detailJson: string) => E;
  private registrations = new Map<number, Registration<E>>();
  private nextId = 1;

  constructor(label: string, parse: (message: string, detailJson: string) => E) {
    this.label = label;
    this.parse = parse;
  }

  add(callback: NotificationCallback): number {
    return this.register({ kind: "raw", callback });
  }

  addEventSink(sink: EventSink<E>): number {
    return this.register({ kind: "event", sink });
  }

  remove(id: number): boolean {
    return this.registrations.delete(id);
  }

  clear(): void {
    this.registrations.clear();
  }

  get size(): number {
    return this.registrations.size;
  }

  dispatch(message: string, detailJson: string): void {
    let event: E | null = null;
    for (const [id, registration] of [...this.registrations]) {
      try {
        let result: void | Promise<void>;
        if (registration.kind === "raw") {
          result = registration.callback(message, detailJson);
        } else {
          if (event === null) {
            event = this.parse(message, detailJson);
          }
          result = registration.sink.onEvent(event);
        }
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.report(id, message, error));
        }
      } catch (error) {
        this.report(id, message, error);
      }
    }
  }

  private register(registration: Registration<E>): number {
    const id = this.nextId++;
    this.registrations.set(id, registration);
    return id;
  }

  private report(id: number, message: string, error: unknown): void {
    logger.error(`${this.label} sink ${id} failed on ${message}: ${describeError(error)}`);
  }
}
