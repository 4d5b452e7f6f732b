import fp from "fastify-plugin";
import { FastifyInstance } from "fastify";
import cors from "@fastify/cors";

export interface CorsPluginOptions {
  /** Allowed origins; "*" allows any. */
  origins: string[];
}

export const corsPlugin = fp(
  async function corsPlugin(fastify: FastifyInstance, options: CorsPluginOptions) {
    const allowAny = options.origins.includes("*");

    await fastify.register(cors, {
      origin: (origin, callback) => {
        // No Origin header: curl, server-to-server
        if (!origin || allowAny) {
          callback(null, true);
          return;
        }
        callback(null, options.origins.includes(origin));
      },
      methods: ["GET", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    });
  },
  { name: "cors-plugin" },
);
