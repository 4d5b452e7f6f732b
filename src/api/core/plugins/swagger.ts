import fp from "fastify-plugin";
import { FastifyInstance } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

export interface SwaggerPluginOptions {
  domain: string;
  env: string;
}

/**
 * OpenAPI document and Swagger UI at /api-docs.
 * Wrapped in fastify-plugin so the routes registered later are documented.
 */
export const swaggerPlugin = fp(
  async function swaggerPlugin(fastify: FastifyInstance, options: SwaggerPluginOptions) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: "Appliance Consumables API",
          description: "Model-number lookup and autocomplete over the appliance consumables catalog",
          version: "1.0.0",
        },
        servers: [
          {
            url: options.domain,
            description: options.env === "development" ? "Development server" : "Production server",
          },
        ],
        tags: [
          { name: "Consumables", description: "Consumables by model number" },
          { name: "Suggestions", description: "Model-number autocomplete" },
          { name: "Categories", description: "Catalog browse" },
          { name: "Health", description: "Service and database health" },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: "/api-docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: false,
      },
      staticCSP: options.env === "production",
      transformStaticCSP: (header) => {
        // Swagger UI needs inline styles
        return header.replace("style-src 'self' https:", "style-src 'self' https: 'unsafe-inline'");
      },
    });
  },
  { name: "swagger-plugin" },
);
