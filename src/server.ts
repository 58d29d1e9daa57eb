import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config/app-config";
import { createLogger } from "./logger";
import { SlidingWindowLoggingRateLimiter } from "./sliding-window-logging/sliding-window-logging";
import { GitHubClient } from "./github/github-client";
import { Marketplace } from "./marketplace/marketplace";
import { SettingsStore } from "./settings/settings-store";
import { resolveToken } from "./settings/resolve-token";
import { ExecFileCliTool } from "./cli/cli-tool";
import { UpdateChecker } from "./updates/update-checker";
import { AppError } from "./errors";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("extension-manager", config.logLevel);

  // GitHub API 용 limiter 하나를 프로세스 전체가 공유한다
  const limiter = new SlidingWindowLoggingRateLimiter(config.githubRateLimit, { logger });
  const settings = new SettingsStore(config.settingsFile);
  const githubClient = new GitHubClient({
    limiter,
    logger,
    token: await resolveToken(
      settings,
      { plainToken: config.githubToken, password: config.githubTokenPassword },
      logger
    ),
  });

  const app = createApp({
    logger,
    settings,
    githubClient,
    marketplace: new Marketplace(githubClient, settings),
    updateChecker: new UpdateChecker(githubClient, new ExecFileCliTool(config.cliBinary), {
      appVersion: config.appVersion,
      appReleasesUrl: config.appReleasesUrl,
    }),
    extensionsDir: config.extensionsDir,
  });

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        authenticated: githubClient.hasToken(),
        rateLimit: config.githubRateLimit,
      },
      "extension manager listening"
    );
  });
}

main().catch((error: unknown) => {
  const message = error instanceof AppError ? error.message : String(error);
  console.error(`Failed to start: ${message}`);
  process.exit(1);
});
