import { config } from "dotenv";
import { homeFile } from "@/home";

config({ path: homeFile(".env") });

// The logger reads LOG_LEVEL when it is first imported, so settle it before loading the CLI.
const { getLogLevel } = await import("@/config");
try {
  process.env.LOG_LEVEL = getLogLevel();
} catch (error) {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

await import("@/cli");
