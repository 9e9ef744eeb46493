export { trending, featured, category, CATEGORIES } from "@/commands/listing";
export { search, expand } from "@/commands/search";
export { event, market } from "@/commands/lookup";
export type { OutputOptions } from "@/commands/render";
