import { loadConfig, type ConfigOverrides } from "./config.js";
import { createLogger } from "./logger.js";
import { ContentAddressedDownloader } from "./mirror/downloader.js";
import { SilentProgressReporter, SpinnerProgressReporter } from "./mirror/progress.js";
import { TreeWalker } from "./mirror/walker.js";
import { PagedTreeClient } from "./remote/client.js";
import { RetryingFetcher } from "./remote/fetcher.js";

export function createAppContext(overrides: ConfigOverrides = {}) {
  const config = loadConfig(overrides);

  const logger = createLogger(config);
  const fetcher = new RetryingFetcher({
    userAgent: config.userAgent,
    sessionCookie: config.sessionCookie,
    retries: config.fetchRetries,
    retryDelayMs: config.retryDelayMs
  });
  const client = new PagedTreeClient(fetcher, { baseUrl: config.baseUrl, apiKey: config.apiKey });
  const downloader = new ContentAddressedDownloader(fetcher);
  const progress = config.progress ? new SpinnerProgressReporter() : new SilentProgressReporter();
  const walker = new TreeWalker(client, downloader, logger, progress, {
    pageRetryLimit: config.pageRetryLimit,
    pageRetryDelayMs: config.pageRetryDelayMs
  });

  return {
    config,
    logger,
    fetcher,
    client,
    walker
  };
}
