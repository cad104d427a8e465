const CloudValue = {
  type: "object",
  required: ["name", "type", "value"],
  properties: {
    name: { type: "string" },
    type: { type: "string" },
    units: { type: "string", nullable: true },
    value: { type: "string", nullable: true, description: "JSON-encoded value" }
  }
};

const errorResponse = (description: string) => ({
  description,
  content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } }
});

export const openapi = {
  openapi: "3.0.3",
  info: { title: "Cloud Simulation Gateway", version: "1.0.0" },
  servers: [{ url: "/" }],
  components: {
    securitySchemes: {
      BearerAuth: { type: "http", scheme: "bearer" }
    },
    schemas: {
      CloudValue,
      Error: {
        type: "object",
        properties: {
          error: {
            type: "object",
            required: ["code", "message"],
            properties: {
              code: { type: "string", enum: ["VALIDATION_ERROR", "UNAUTHORIZED", "NOT_FOUND", "CLOUD_ERROR", "INTERNAL"] },
              message: { type: "string" },
              details: {}
            }
          }
        }
      },
      RunRequest: {
        type: "object",
        required: ["server_capacity"],
        properties: {
          server_capacity: { type: "integer", minimum: 1, maximum: 2147483647 },
          model_name: { type: "string", default: "Service System Demo" },
          experiment_name: { type: "string", default: "Baseline" }
        }
      },
      SimulationResult: {
        type: "object",
        properties: {
          simulation_id: { type: "string", format: "uuid" },
          server_capacity: { type: "integer" },
          mean_queue_size: { type: "number" },
          server_utilization: { type: "number" },
          raw_outputs: { type: "array", items: { $ref: "#/components/schemas/CloudValue" } },
          status: { type: "string", enum: ["completed"] }
        }
      },
      SimulationRecord: {
        type: "object",
        properties: {
          id: { type: "string", format: "uuid" },
          model_name: { type: "string" },
          experiment_name: { type: "string" },
          version_id: { type: "string", nullable: true },
          server_capacity: { type: "integer" },
          status: { type: "string", enum: ["completed", "failed"] },
          mean_queue_size: { type: "number", nullable: true },
          server_utilization: { type: "number", nullable: true },
          raw_outputs: { type: "array", nullable: true, items: { $ref: "#/components/schemas/CloudValue" } },
          error: { type: "string", nullable: true },
          started_at: { type: "string", format: "date-time" },
          finished_at: { type: "string", format: "date-time" },
          duration_ms: { type: "integer" }
        }
      },
      ModelSummary: {
        type: "object",
        properties: {
          id: { type: "string" },
          name: { type: "string" },
          description: { type: "string", nullable: true },
          versions: { type: "integer" },
          latest_version_id: { type: "string", nullable: true }
        }
      }
    }
  },
  security: [{ BearerAuth: [] }],
  tags: [{ name: "Models" }, { name: "Simulations" }, { name: "Service" }],
  paths: {
    "/models": {
      get: {
        tags: ["Models"],
        summary: "List models available to the API key",
        responses: {
          "200": {
            description: "OK",
            content: { "application/json": { schema: {
              type: "object",
              properties: {
                items: { type: "array", items: { $ref: "#/components/schemas/ModelSummary" } },
                total: { type: "integer" }
              }
            } } }
          },
          "401": errorResponse("Unauthorized"),
          "500": errorResponse("Cloud error")
        }
      }
    },
    "/models/{name}/latest": {
      get: {
        tags: ["Models"],
        summary: "Latest model version with experiments and inputs",
        parameters: [{ in: "path", name: "name", required: true, schema: { type: "string" } }],
        responses: { "200": { description: "OK" }, "401": errorResponse("Unauthorized"), "500": errorResponse("Cloud error") }
      }
    },
    "/simulations/run": {
      post: {
        tags: ["Simulations"],
        summary: "Run the model with a given server capacity",
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/RunRequest" } } }
        },
        responses: {
          "200": {
            description: "OK",
            content: { "application/json": { schema: { $ref: "#/components/schemas/SimulationResult" } } }
          },
          "401": errorResponse("Unauthorized"),
          "422": errorResponse("Validation error"),
          "500": errorResponse("Cloud error")
        }
      }
    },
    "/simulations": {
      get: {
        tags: ["Simulations"],
        summary: "Run history, newest first",
        parameters: [
          { in: "query", name: "limit", schema: { type: "integer", default: 20, minimum: 1, maximum: 200 } },
          { in: "query", name: "offset", schema: { type: "integer", default: 0, minimum: 0 } }
        ],
        responses: { "200": { description: "OK" }, "401": errorResponse("Unauthorized"), "422": errorResponse("Validation error") }
      }
    },
    "/simulations/{id}": {
      get: {
        tags: ["Simulations"],
        summary: "One recorded run",
        parameters: [{ in: "path", name: "id", required: true, schema: { type: "string", format: "uuid" } }],
        responses: {
          "200": {
            description: "OK",
            content: { "application/json": { schema: { $ref: "#/components/schemas/SimulationRecord" } } }
          },
          "404": errorResponse("Not found")
        }
      }
    },
    "/healthz": {
      get: {
        tags: ["Service"],
        summary: "Service health",
        security: [],
        responses: { "200": { description: "OK" } }
      }
    }
  }
};
