import { getGammaConfig } from "@/config";
import { GammaClient } from "@/gamma/client";

export { GammaClient } from "@/gamma/client";
export * from "@/gamma/errors";
export { extractSlugFromUrl } from "@/gamma/slug";
export type { EventQuery, EventSource, GammaEvent, GammaMarket } from "@/gamma/schema";

export function createGammaClient(): GammaClient {
  return new GammaClient(getGammaConfig());
}
