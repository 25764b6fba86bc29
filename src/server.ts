import Fastify, { type FastifyError } from "fastify";
import multipart from "@fastify/multipart";
import { getConfig, type AppConfig } from "./config";
import { healthRoutes } from "./routes/health";
import { uploadsRoutes, type UploadsRouteOptions } from "./routes/uploads";
import { workflowsRoutes, type WorkflowsRouteOptions } from "./routes/workflows";
import { errorResponse, withRequestMeta } from "./utils/http-envelope";

export interface BuildServerOptions {
  config?: AppConfig;
  uploads?: UploadsRouteOptions;
  workflows?: WorkflowsRouteOptions;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? options.workflows?.config ?? getConfig();
  const app = Fastify({ logger: { level: config.logLevel } });

  app.addHook("onSend", (request, reply, payload, done) => {
    reply.header("x-request-id", request.id);
    done(null, payload);
  });

  app.addHook("preSerialization", (request, _reply, payload, done) => {
    done(null, withRequestMeta(payload, request.id));
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ error }, "request failed");
      return reply
        .code(statusCode)
        .send(errorResponse("INTERNAL_ERROR", "Internal server error"));
    }

    return reply
      .code(statusCode)
      .send(errorResponse(error.code || "BAD_REQUEST", error.message));
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  });

  app.register(healthRoutes);
  app.register(uploadsRoutes, options.uploads ?? {});
  app.register(workflowsRoutes, {
    config,
    ...(options.workflows ?? {}),
  });

  return app;
}

export function getListenAddress(config: AppConfig = getConfig()): { port: number; host: string } {
  return { port: config.port, host: config.host };
}
