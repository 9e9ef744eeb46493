import { Command, InvalidArgumentError } from "commander";
import { METADATA } from "@/meta";
import { getSearchConfig } from "@/config";
import { log } from "@/logger";
import { createGammaClient, GammaError } from "@/gamma";
import { category, event, expand, featured, market, search, trending } from "@/commands";
import { init } from "@/wizard/init";

type GlobalOptions = {
  limit?: number;
  json?: boolean;
  all?: boolean;
};

function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Limit must be a positive integer.");
  }
  return n;
}

function globals(cmd: Command): Required<GlobalOptions> {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  return {
    limit: opts.limit ?? getSearchConfig().defaultLimit,
    json: opts.json ?? false,
    all: opts.all ?? false,
  };
}

async function run(task: () => Promise<string> | string): Promise<void> {
  try {
    console.log(await task());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof GammaError) {
      log.error({ code: error.code, err: error }, "api request failed");
      console.error(`❌ API Error: ${message}`);
    } else {
      log.error({ err: error }, "command failed");
      console.error(`❌ Error: ${message}`);
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("marketscout")
  .description("Prediction market lookup with fuzzy search")
  .option("-l, --limit <n>", "Number of results", parseLimit)
  .option("-j, --json", "Output raw JSON")
  .option("-a, --all", "Show all markets in event");

program
  .command("trending")
  .description("Get trending markets")
  .action(async (_opts: unknown, cmd: Command) => {
    await run(() => trending(createGammaClient(), globals(cmd)));
  });

program
  .command("featured")
  .description("Get featured markets")
  .action(async (_opts: unknown, cmd: Command) => {
    await run(() => featured(createGammaClient(), globals(cmd)));
  });

program
  .command("search")
  .description("Search markets")
  .argument("<query...>", "Search query")
  .option("-a, --all", "Show all outcomes")
  .action(async (query: string[], _opts: unknown, cmd: Command) => {
    await run(() => search(createGammaClient(), query.join(" "), globals(cmd)));
  });

program
  .command("event")
  .description("Get event by slug or URL")
  .argument("<slug>", "Event slug or polymarket.com URL")
  .action(async (slug: string, _opts: unknown, cmd: Command) => {
    await run(() => event(createGammaClient(), slug, globals(cmd)));
  });

program
  .command("market")
  .description("Get specific market outcome")
  .argument("<slug>", "Event slug or URL")
  .argument("[outcome]", "Outcome name (e.g. 'warriors')")
  .action(async (slug: string, outcome: string | undefined, _opts: unknown, cmd: Command) => {
    await run(() => market(createGammaClient(), slug, outcome, globals(cmd)));
  });

program
  .command("category")
  .description("Markets by category")
  .argument("<category>", "Category: politics, crypto, sports, tech, etc.")
  .action(async (name: string, _opts: unknown, cmd: Command) => {
    await run(() => category(createGammaClient(), name, globals(cmd)));
  });

program
  .command("expand")
  .description("Show the variants a search query expands to")
  .argument("<query...>", "Search query")
  .action(async (query: string[], _opts: unknown, cmd: Command) => {
    await run(() => expand(query.join(" "), globals(cmd)));
  });

program
  .command("init")
  .description("Create the .home directory with a default config")
  .action(async () => {
    await init();
  });

program
  .command("version")
  .description("Show version information")
  .action(() => {
    console.log(`${METADATA.NAME} ${METADATA.VERSION} (${METADATA.BUILD})`);
  });

await program.parseAsync();
