import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { readAppConfig } from "./config";
import { Orchestrator } from "./orchestrator";
import { MainBus } from "./protocol/bus";
import { NodeScheduler } from "./runtime/scheduler";
import { FsAssetSource } from "./services/asset.service";
import { CredentialService, CredentialStore } from "./services/credential.service";
import { LLMService } from "./services/llm.service";
import { MarketDataService } from "./services/market-data.service";
import { WebSearchService } from "./services/web-search.service";
import { HeadlessAnchorWindow, HeadlessWindowHost } from "./windows/headless.host";
import { TerminalDriver } from "./windows/terminal.driver";

const APP_ROOT = fileURLToPath(new URL("../..", import.meta.url));

function resolveConfigPath() {
  const fromEnv = String(process.env.DESKDOGE_CONFIG ?? "").trim();
  if (fromEnv) return resolve(fromEnv);
  const cwdPath = resolve(process.cwd(), "config.json");
  return existsSync(cwdPath) ? cwdPath : resolve(APP_ROOT, "config.json");
}

function bootstrap() {
  const configPath = resolveConfigPath();
  const config = readAppConfig(configPath);
  console.log(`[main] config=${configPath} model=${config.llm.model} assets=${config.assets.dir}`);

  const scheduler = new NodeScheduler();
  const bus = new MainBus();
  const host = new HeadlessWindowHost();
  const anchor = new HeadlessAnchorWindow(config.window);

  const credentials = new CredentialService({ store: new CredentialStore(config.credential.path), env: process.env });
  const llm = new LLMService({
    baseUrl: config.llm.baseUrl,
    getApiKey: () => credentials.secret,
    timeoutMs: config.llm.timeoutMs,
    temperature: config.llm.temperature
  });
  console.log(`[llm] configured=${llm.isConfigured()}`);

  let shutdown = () => {};
  const driver: TerminalDriver = new TerminalDriver({
    input: process.stdin,
    host,
    anchor,
    dispatch: (raw) => app.dispatch(raw),
    onQuit: () => app.exit()
  });

  const app: Orchestrator = new Orchestrator({
    config,
    scheduler,
    bus,
    host,
    anchor,
    assets: new FsAssetSource(config.assets.dir, config.assets.animations),
    market: new MarketDataService({
      baseUrl: config.price.baseUrl,
      vsCurrency: config.price.vsCurrency,
      timeoutMs: config.price.timeoutMs
    }),
    search: new WebSearchService(config.search),
    completion: llm,
    credentials,
    credentialPrompt: driver,
    onExit: () => shutdown()
  });

  shutdown = () => {
    driver.stop();
    scheduler.cancelAll();
    bus.removeAllListeners();
    console.log("[main] bye");
  };

  process.once("SIGINT", () => app.exit());
  process.once("SIGTERM", () => app.exit());

  app.start();
  driver.start();
}

try {
  bootstrap();
} catch (err) {
  console.error("[main] bootstrap failed:", err);
  process.exitCode = 1;
}
