export const openapi = {
  openapi: "3.0.3",
  info: { title: "HEMS Controller — status API", version: "1.1.3" },
  components: {
    securitySchemes: {
      BearerAuth: { type: "http", scheme: "bearer" }
    },
    schemas: {
      Command: {
        type: "object",
        required: ["entity_id", "service"],
        properties: {
          entity_id:   { type: "string", example: "climate.living_room" },
          service:     { type: "string", enum: ["set_hvac_mode", "set_temperature"] },
          hvac_mode:   { type: "string", enum: ["heat", "cool", "off"] },
          temperature: { type: "number" }
        }
      },
      CycleReport: {
        type: "object",
        properties: {
          building_id:         { type: "string" },
          started_at:          { type: "string", format: "date-time" },
          finished_at:         { type: "string", format: "date-time", nullable: true },
          ok:                  { type: "boolean" },
          error:               { type: "string", nullable: true },
          outside_temperature: { type: "number", nullable: true },
          heat_pump_mode:      { type: "string", enum: ["heat", "cool", "off"], nullable: true },
          heat_pump_cop:       { type: "number", nullable: true },
          peak_event: {
            type: "object", nullable: true,
            properties: { start: { type: "string", format: "date-time" }, end: { type: "string", format: "date-time" } }
          },
          actions: {
            type: "object", nullable: true,
            properties: {
              heat_pump: {
                type: "object",
                properties: { state: { type: "string" }, setpoint: { type: "number", nullable: true } }
              },
              zones: { type: "object", additionalProperties: { type: "number" } }
            }
          },
          commands: { type: "array", items: { $ref: "#/components/schemas/Command" } }
        }
      }
    }
  },
  security: [{ BearerAuth: [] }],
  tags: [{ name: "Health" }, { name: "Control" }, { name: "Telemetry" }],
  paths: {
    "/v1/healthz": {
      get: {
        tags: ["Health"],
        summary: "Liveness",
        security: [],
        responses: { "200": { description: "OK" } }
      }
    },
    "/v1/status": {
      get: {
        tags: ["Control"],
        summary: "Latest control cycle",
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: { $ref: "#/components/schemas/CycleReport" } } } },
          "401": { description: "Unauthorized" },
          "503": { description: "No cycle yet" }
        }
      }
    },
    "/v1/cycle": {
      post: {
        tags: ["Control"],
        summary: "Run a control cycle now",
        responses: {
          "200": { description: "Cycle succeeded", content: { "application/json": { schema: { $ref: "#/components/schemas/CycleReport" } } } },
          "401": { description: "Unauthorized" },
          "409": { description: "A cycle is already running" },
          "500": { description: "Cycle failed" }
        }
      }
    },
    "/v1/zones": {
      get: {
        tags: ["Control"],
        summary: "Configured zones with their scheduled target",
        responses: { "200": { description: "OK" }, "401": { description: "Unauthorized" }, "500": { description: "Config error" } }
      }
    },
    "/v1/metrics": {
      get: {
        tags: ["Telemetry"],
        summary: "Flat metrics document for Telegraf inputs.http (json, tag building_id)",
        responses: { "200": { description: "OK" }, "401": { description: "Unauthorized" } }
      }
    }
  }
};
