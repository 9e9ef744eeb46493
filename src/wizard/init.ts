import { existsSync, mkdirSync, cpSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import * as p from "@clack/prompts";
import { log } from "@/logger";
import { METADATA } from "@/meta";
import { getHomeDir, HOME_ENV_VAR, homeFile, setHomeDir } from "@/home";
import { resetConfig } from "@/config";

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMPLATE_DIR = resolve(__dirname, "../../template/home");

export async function init(): Promise<void> {
  p.intro(`${METADATA.NAME} ${METADATA.VERSION}`);
  const defaultHome = getHomeDir();

  const homeDir = await p.text({
    message: "Home dir",
    initialValue: defaultHome,
    placeholder: defaultHome,
    validate: (v) => {
      if (!v?.trim()) return "Home dir is required";
      return undefined;
    },
  });

  if (p.isCancel(homeDir)) {
    p.cancel("Operation cancelled.");
    process.exitCode = 1;
    return;
  }

  const targetHome = resolve(homeDir.trim());
  setHomeDir(targetHome);
  if (existsSync(homeFile("config.toml"))) {
    const overwrite = await p.confirm({ message: "config.toml already exists. Overwrite it?", initialValue: false });
    if (p.isCancel(overwrite) || !overwrite) {
      p.outro(`Keeping ${homeFile("config.toml")}`);
      return;
    }
  }

  const spinner = p.spinner();
  spinner.start("Writing default config...");
  mkdirSync(targetHome, { recursive: true });
  cpSync(TEMPLATE_DIR, targetHome, { recursive: true });
  resetConfig();
  spinner.stop(`Home dir initialized at ${targetHome}`);
  log.info({ homeDir: targetHome }, "home initialized");

  if (targetHome !== defaultHome) {
    p.note(`export ${HOME_ENV_VAR}=${targetHome}`, "Outside the discovered work dir; point the CLI at it with");
  }
  p.outro(`Try: ${METADATA.NAME} search "who will win march madness"`);
}
