import { Extension } from "../../interfaces/extension";
import { ExtensionValue } from "../../types";
import { CloudEvent } from "../event/cloud-event";

export const TRACEPARENT = "traceparent";
export const TRACESTATE = "tracestate";

/**
 * W3C trace context carried as the `traceparent` / `tracestate` extensions.
 */
export class DistributedTracingExtension implements Extension {
  constructor(
    public readonly traceparent: string,
    public readonly tracestate?: string
  ) {}

  static fromEvent(event: CloudEvent): DistributedTracingExtension | undefined {
    const traceparent = event.getExtension(TRACEPARENT);
    if (typeof traceparent !== "string") return undefined;
    const tracestate = event.getExtension(TRACESTATE);
    return new DistributedTracingExtension(
      traceparent,
      typeof tracestate === "string" ? tracestate : undefined
    );
  }

  asMap(): Record<string, ExtensionValue> {
    const map: Record<string, ExtensionValue> = { [TRACEPARENT]: this.traceparent };
    if (this.tracestate !== undefined) {
      map[TRACESTATE] = this.tracestate;
    }
    return map;
  }
}
