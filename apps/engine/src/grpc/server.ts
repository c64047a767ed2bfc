import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import path from "path";
import { HealthService } from "./health.service";
import { WorkflowOperations, WorkflowServiceImpl } from "./workflow.service";

const PROTO_DIR = path.join(__dirname, "../../../..", "packages/proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export function loadService(file: string, name: string): protoLoader.ServiceDefinition {
  const definition = protoLoader.loadSync(path.join(PROTO_DIR, file), protoOptions);
  const service = definition[name];
  if (!service || "format" in service) {
    throw new Error(`Service ${name} not found in ${file}`);
  }
  return service;
}

export function createGrpcServer(workflows: WorkflowOperations, health: HealthService): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  server.addService(loadService("health.service.proto", "grpc.health.v1.Health"), {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  const impl = new WorkflowServiceImpl(workflows);
  server.addService(loadService("workflow.service.proto", "proactive.WorkflowService"), {
    startWorkflow: impl.startWorkflow.bind(impl),
    continueWorkflow: impl.continueWorkflow.bind(impl),
    getWorkflowStatus: impl.getWorkflowStatus.bind(impl),
    listWorkflows: impl.listWorkflows.bind(impl),
    cancelWorkflow: impl.cancelWorkflow.bind(impl),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[proactive] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}
