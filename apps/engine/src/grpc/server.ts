import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import path from 'path';
import { HealthProbe, HealthService } from './health.service';
import { InspectionServiceImpl } from './inspection.service';

// dist/apps/engine/src/grpc sits one level deeper than apps/engine/src/grpc
const REPO_ROOT = path.resolve(__dirname, path.extname(__filename) === '.ts' ? '../../../..' : '../../../../..');
const PROTO_DIR = path.join(REPO_ROOT, 'packages/proto');

const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

/** Walks a loaded package down to a service, e.g. ["vigil", "InspectionService"]. */
export function lookupService(root: grpc.GrpcObject, servicePath: string[]): grpc.ServiceDefinition {
    let node: GrpcNode = root;
    for (const segment of servicePath) {
        if (typeof node !== 'object' || 'format' in node) {
            throw new Error(`"${segment}" is not inside a proto namespace`);
        }
        const next: GrpcNode | undefined = node[segment];
        if (!next) throw new Error(`Proto path ${servicePath.join('.')} not found`);
        node = next;
    }
    if (typeof node === 'function' && 'service' in node) return node.service;
    throw new Error(`${servicePath.join('.')} is not a service`);
}

export function loadProto(file: string): protoLoader.PackageDefinition {
    return protoLoader.loadSync(path.join(PROTO_DIR, file), protoOptions);
}

export function createGrpcServer(inspection: InspectionServiceImpl, probes: HealthProbe[]): grpc.Server {
    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    const healthPackageDef = loadProto('health.service.proto');
    const inspectionPackageDef = loadProto('inspection.service.proto');

    const healthService = new HealthService(probes);
    server.addService(lookupService(grpc.loadPackageDefinition(healthPackageDef), ['grpc', 'health', 'v1', 'Health']), {
        check: healthService.check.bind(healthService),
        watch: healthService.watch.bind(healthService),
    });

    server.addService(
        lookupService(grpc.loadPackageDefinition(inspectionPackageDef), ['vigil', 'InspectionService']),
        inspection.handlers(),
    );

    // reflection for grpcurl debugging
    const reflection = new ReflectionService({ ...healthPackageDef, ...inspectionPackageDef });
    reflection.addToServer(server);

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
            } else {
                console.log(`[vigil] grpc server listening on port ${boundPort}`);
                resolve(boundPort);
            }
        });
    });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
    return new Promise((resolve) => server.tryShutdown(() => resolve()));
}
