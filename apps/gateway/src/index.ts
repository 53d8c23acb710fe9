import { config } from "./config";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import {
  A2AHttpInvoker,
  Gateway,
  Reaper,
  SnapshotService,
} from "./services";

const TAG = "[relaygate]";

// Wiring
const invoker = new A2AHttpInvoker({ timeoutMs: config.remoteTimeoutMs });
const gateway = new Gateway(invoker, config);
const snapshots = new SnapshotService(gateway, {
  dataDir: config.dataDir,
  intervalMs: config.snapshotIntervalMs,
});
const reaper = new Reaper(
  gateway.tasks,
  config.taskRetentionSeconds,
  config.reaperIntervalMs,
);

let ready = false;
const grpcServer = createGrpcServer(gateway, { isReady: () => ready });

async function main() {
  console.log(
    `${TAG} starting gateway... (immediate timeout: ${config.immediateResponseTimeoutMs}ms, poll interval: ${config.pollIntervalMs}ms)`,
  );

  await snapshots.load();
  snapshots.start();
  reaper.start();

  await startGrpcServer(grpcServer, config.port, config.host);
  ready = true;

  console.log(`${TAG} gateway ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  ready = false;
  console.log(`${TAG} ${signal} received, shutting down...`);

  await stopGrpcServer(grpcServer);
  reaper.stop();
  snapshots.stop();
  await gateway.shutdown();

  try {
    await snapshots.save();
  } catch (err) {
    console.error(`${TAG} final snapshot failed:`, err);
  }

  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: NodeJS.Signals) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", onSignal);
process.on("SIGINT", onSignal);
process.on("SIGUSR2", onSignal);

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
