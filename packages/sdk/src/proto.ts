import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

export const GATEWAY_PROTO_PATH = path.resolve(__dirname, '../../proto/gateway.service.proto');
export const HEALTH_PROTO_PATH = path.resolve(__dirname, '../../proto/health.service.proto');

export const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export function loadProto(protoPath: string): protoLoader.PackageDefinition {
    return protoLoader.loadSync(protoPath, protoOptions);
}

function isServiceClientConstructor(value: unknown): value is grpc.ServiceClientConstructor {
    return typeof value === 'function' && 'service' in value;
}

// Walks a dotted name like `relaygate.GatewayService` through the loaded package tree.
export function lookupService(
    definition: protoLoader.PackageDefinition,
    qualifiedName: string,
): grpc.ServiceClientConstructor {
    let node: unknown = grpc.loadPackageDefinition(definition);

    for (const segment of qualifiedName.split('.')) {
        if ((typeof node !== 'object' && typeof node !== 'function') || node === null) {
            break;
        }
        node = Reflect.get(node, segment);
    }

    if (!isServiceClientConstructor(node)) {
        throw new Error(`service ${qualifiedName} not found in proto definition`);
    }
    return node;
}
