import Fastify, { type FastifyInstance } from "fastify";

import { isShareGateError } from "../lib/errors.js";
import { fetchRates, ratesError, type FetchRatesOptions } from "./rates.js";

export interface BuildServerOptions {
  logger?: boolean;
  rates?: FetchRatesOptions;
}

export function buildServer(options: BuildServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false });

  app.get("/", async () => ({ status: "ok" }));

  app.get("/rates", async (_request, reply) => {
    try {
      return await fetchRates(options.rates);
    } catch (error) {
      if (isShareGateError(error) && error.status !== undefined) {
        app.log.warn({ code: error.code }, error.message);
        reply.code(error.status);
        return ratesError(error.status, error.message);
      }
      throw error;
    }
  });

  return app;
}
