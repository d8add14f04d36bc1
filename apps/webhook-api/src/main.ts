import { createServer } from "node:http";

import { loadDocwatchConfig } from "@docwatch/config-loader";
import { InMemoryJobQueue } from "@docwatch/job-store";
import {
  createWorkerContext,
  bootstrapInstallations,
  drainJobs,
  loadConfig as loadWorkerConfig,
  runPollCycleWithInFlightGuard,
} from "@docwatch/worker";

import { createWebhookHandler, loadConfig } from "./index";
import { createRequestListener } from "./server";

const config = loadConfig();
const workerConfig = loadWorkerConfig();
const docwatchConfig = loadDocwatchConfig();
const context = createWorkerContext(workerConfig, docwatchConfig);
const queue = new InMemoryJobQueue();
const pollCycleState = { isPollInFlight: false };

let needsDiscovery = (await bootstrapInstallations(context)) === null;

const server = createServer(
  createRequestListener(
    createWebhookHandler({
      config,
      enqueue: (job) => queue.enqueue(job),
    }),
  ),
);

server.listen(config.port, () => {
  console.log(
    `[webhook-api] listening on :${config.port} (signature verification: ${config.webhookSecret ? "enabled" : "disabled"})`,
  );
});

async function pollAndProcessJobs(): Promise<void> {
  const didRun = await runPollCycleWithInFlightGuard(pollCycleState, async () => {
    if (needsDiscovery) {
      needsDiscovery = (await bootstrapInstallations(context)) === null;
    }

    const result = await drainJobs(queue, context);
    if (result.processed + result.failed > 0) {
      console.log(`[worker] cycle processed=${result.processed} failed=${result.failed}`);
    }
  });

  if (!didRun) {
    console.log("[worker] skipped poll cycle because previous cycle is still running");
  }
}

const pollTimer = setInterval(() => {
  pollAndProcessJobs().catch((error: unknown) => {
    const details = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(`[worker] poll cycle failed: ${details}`);
  });
}, workerConfig.pollIntervalMs);

console.log(
  `[worker] started (poll=${workerConfig.pollIntervalMs}ms, max_keys=${workerConfig.maxProcessedKeys}, dry_run=${workerConfig.dryRun})`,
);

function shutdown(signal: NodeJS.Signals): void {
  console.log(`[webhook-api] received ${signal}, shutting down`);
  clearInterval(pollTimer);
  context.credentials.invalidateAll();
  server.close((error) => {
    if (error) {
      console.error(`[webhook-api] failed to close server: ${error.message}`);
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
