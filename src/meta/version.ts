import { createHash } from "crypto";
import { execSync } from "child_process";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "..", "package.json"), "utf-8")));

const master = pkg.version;

let sha256: string;
try {
  sha256 = execSync("git rev-parse HEAD", {
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
  }).trim();
} catch {
  sha256 = createHash("sha256").update(pkg.version).digest("hex");
}

export const version = { name: pkg.name, master, sha256 };
export const BUILD = sha256.slice(0, 7);
