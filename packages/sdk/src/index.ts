// public api for @relaygate/sdk
// usage:
//   import { createGatewayClient } from '@relaygate/sdk';
//   const gateway = createGatewayClient('localhost:50051');
//   const task = await gateway.sendMessage('http://localhost:10000', 'hi');

export * from './types';
export { createGatewayClient, parseTaskSnapshot, parseAgentDescriptor } from './grpc-client';
export type { GatewayClient } from './grpc-client';
export { GATEWAY_PROTO_PATH, HEALTH_PROTO_PATH, protoOptions, loadProto, lookupService } from './proto';
export { serialize, deserialize, SerializationError } from './utils/serialization';
