import type { GammaEvent } from "@/gamma/schema";
import { formatEvent } from "@/format";

export type OutputOptions = {
  limit: number;
  json?: boolean;
  all?: boolean;
  now?: Date;
};

export function renderEvents(header: string, events: readonly GammaEvent[], options: OutputOptions, notes: string[] = []): string {
  if (options.json) return JSON.stringify(events, null, 2);
  const lines = [header, "", ...notes];
  for (const event of events) {
    lines.push(formatEvent(event, options.all ?? false, options.now), "");
  }
  return lines.join("\n");
}
