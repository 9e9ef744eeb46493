import { version, BUILD } from "@/meta/version";

export const METADATA = Object.freeze({
  NAME: version.name,
  VERSION: version.master,
  BUILD,
});
