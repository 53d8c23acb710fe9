import * as grpc from "@grpc/grpc-js";
import { ReflectionService } from "@grpc/reflection";
import {
  GATEWAY_PROTO_PATH,
  HEALTH_PROTO_PATH,
  loadProto,
  lookupService,
} from "@relaygate/sdk";
import { Gateway } from "../services/gateway";
import { HealthService } from "./health.service";
import { GatewayServiceImpl } from "./gateway.service";

export interface GrpcServerOptions {
  isReady?: () => boolean;
}

export function createGrpcServer(
  gateway: Gateway,
  options: GrpcServerOptions = {},
): grpc.Server {
  const healthPackageDef = loadProto(HEALTH_PROTO_PATH);
  const gatewayPackageDef = loadProto(GATEWAY_PROTO_PATH);

  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(options.isReady ?? (() => true));
  server.addService(
    lookupService(healthPackageDef, "grpc.health.v1.Health").service,
    {
      check: healthService.check.bind(healthService),
      watch: healthService.watch.bind(healthService),
    },
  );

  const gatewayService = new GatewayServiceImpl(gateway);
  server.addService(
    lookupService(gatewayPackageDef, "relaygate.GatewayService").service,
    {
      registerAgent: gatewayService.registerAgent.bind(gatewayService),
      listAgents: gatewayService.listAgents.bind(gatewayService),
      unregisterAgent: gatewayService.unregisterAgent.bind(gatewayService),
      sendMessage: gatewayService.sendMessage.bind(gatewayService),
      sendMessageStream: gatewayService.sendMessageStream.bind(gatewayService),
      getTaskResult: gatewayService.getTaskResult.bind(gatewayService),
      cancelTask: gatewayService.cancelTask.bind(gatewayService),
      getTaskList: gatewayService.getTaskList.bind(gatewayService),
    },
  );

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...gatewayPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
  host: string = "0.0.0.0",
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `${host}:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[relaygate] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error("[relaygate] graceful grpc shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
