import { describe, it } from "mocha";
import { expect } from "chai";

import { parseRegistration, serializeRegistration } from "../../src/catalog/schemas.js";
import { ValidationError } from "../../src/rpc/errors.js";

function captureValidation(payload: unknown): ValidationError {
  try {
    parseRegistration(payload);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("registration should have been rejected");
}

describe("catalog/schemas", () => {
  it("converts the wire durations from seconds to milliseconds", () => {
    const registration = parseRegistration({
      instance_id: "math-1",
      name: "Math worker",
      address: "https://workers.test/math/",
      weight: 250,
      health_check_interval_seconds: 15,
      ttl_seconds: 90,
      tools: [
        {
          tool_id: "add",
          description: "Adds two numbers",
          input_schema: { type: "object", properties: { a: { type: "number" }, b: { type: "number" } } },
          output_schema: { type: "number" },
          timeout_seconds: 2.5,
          retry_attempts: 0,
        },
      ],
    });

    expect(registration).to.deep.equal({
      id: "math-1",
      name: "Math worker",
      address: "https://workers.test/math/",
      weight: 250,
      healthCheckUrl: "https://workers.test/math/health",
      healthCheckIntervalMs: 15_000,
      ttlMs: 90_000,
      tools: [
        {
          id: "add",
          name: "add",
          description: "Adds two numbers",
          inputSchema: { type: "object", properties: { a: { type: "number" }, b: { type: "number" } } },
          outputSchema: { type: "number" },
          timeoutMs: 2_500,
          retryAttempts: 0,
        },
      ],
    });
  });

  it("serializes back to a payload that parses to the same registration", () => {
    const original = parseRegistration({
      instance_id: "text-1",
      address: "http://127.0.0.1:9100",
      health_check_url: "http://127.0.0.1:9100/ready",
      tools: [{ tool_id: "upper" }, { tool_id: "lower", output_schema: { type: "string" } }],
    });

    const wire = serializeRegistration(original);
    expect(wire).to.deep.equal({
      instance_id: "text-1",
      name: "text-1",
      address: "http://127.0.0.1:9100",
      weight: 100,
      health_check_url: "http://127.0.0.1:9100/ready",
      ttl_seconds: 300,
      tools: [
        {
          tool_id: "upper",
          name: "upper",
          description: "",
          input_schema: { type: "object", properties: {} },
          timeout_seconds: 300,
          retry_attempts: 3,
        },
        {
          tool_id: "lower",
          name: "lower",
          description: "",
          input_schema: { type: "object", properties: {} },
          output_schema: { type: "string" },
          timeout_seconds: 300,
          retry_attempts: 3,
        },
      ],
    });
    expect(parseRegistration(wire)).to.deep.equal(original);
  });

  it("names the offending field when the address is not an http url", () => {
    const error = captureValidation({ instance_id: "w1", address: "ftp://files.test" });
    expect(error.code).to.equal(-32602);
    expect(error.data.hint).to.equal("address: must use the http or https scheme");
  });

  it("rejects an empty tool id", () => {
    const error = captureValidation({ instance_id: "w1", address: "http://127.0.0.1", tools: [{ tool_id: "  " }] });
    expect(error.data.hint).to.equal("tools.0.tool_id: must not be empty");
  });

  it("rejects tool ids that would shadow the built-in tools", () => {
    const error = captureValidation({
      instance_id: "w1",
      address: "http://127.0.0.1",
      tools: [{ tool_id: "echo" }, { tool_id: "HUB_status" }],
    });
    expect(error.data.hint).to.equal("tools.1.tool_id: tool ids starting with 'hub_' are reserved for the gateway");
  });

  it("rejects unknown registration fields", () => {
    const error = captureValidation({ instance_id: "w1", address: "http://127.0.0.1", priority: 3 });
    expect(error.data.hint).to.match(/^\(root\): Unrecognized key/);
  });

  it("rejects a non-positive weight", () => {
    const error = captureValidation({ instance_id: "w1", address: "http://127.0.0.1", weight: 0 });
    expect(error.data.hint?.startsWith("weight: ")).to.equal(true);
  });
});
