import { describe, it } from "mocha";
import { expect } from "chai";

import { parseGatewayRuntimeOptions, resolveDefaultOptions } from "../src/serverOptions.js";

describe("parseGatewayRuntimeOptions", () => {
  it("returns the stdio-only defaults", () => {
    const result = parseGatewayRuntimeOptions([], {});

    expect(result).to.deep.equal({
      enableStdio: true,
      http: { enabled: false, port: 8000, host: "127.0.0.1" },
      monitor: {
        probeIntervalMs: 30_000,
        probeTimeoutMs: 10_000,
        failureThreshold: 3,
        cleanupIntervalMs: 60_000,
        retentionMs: 300_000,
      },
      router: {
        breakerThreshold: 5,
        breakerRecoveryMs: 60_000,
        maxConcurrent: 10,
        loadPolicy: "weighted-priority",
      },
      ledgerFile: null,
      logFile: null,
    });
  });

  it("enables HTTP when a port or host is given", () => {
    const result = parseGatewayRuntimeOptions(["--http-port", "9100", "--http-host=0.0.0.0", "--no-stdio"], {});

    expect(result.http).to.deep.equal({ enabled: true, port: 9100, host: "0.0.0.0" });
    expect(result.enableStdio).to.equal(false);
  });

  it("accepts monitor, router and file flags", () => {
    const result = parseGatewayRuntimeOptions(
      [
        "--probe-interval-ms=5000",
        "--probe-timeout-ms",
        "750",
        "--failure-threshold",
        "2",
        "--cleanup-interval-ms",
        "15000",
        "--retention-ms",
        "1000",
        "--breaker-threshold",
        "4",
        "--breaker-recovery-ms",
        "2500",
        "--max-concurrent",
        "32",
        "--load-policy",
        "Least-Load",
        "--ledger-file",
        " ./logs/executions.jsonl ",
        "--log-file",
        "./logs/gateway.log",
      ],
      {},
    );

    expect(result.monitor).to.deep.equal({
      probeIntervalMs: 5_000,
      probeTimeoutMs: 750,
      failureThreshold: 2,
      cleanupIntervalMs: 15_000,
      retentionMs: 1_000,
    });
    expect(result.router).to.deep.equal({
      breakerThreshold: 4,
      breakerRecoveryMs: 2_500,
      maxConcurrent: 32,
      loadPolicy: "least-load",
    });
    expect(result.ledgerFile).to.equal("./logs/executions.jsonl");
    expect(result.logFile).to.equal("./logs/gateway.log");
  });

  it("accepts zero for the retention and breaker recovery windows", () => {
    const result = parseGatewayRuntimeOptions(["--retention-ms", "0", "--breaker-recovery-ms=0"], {});

    expect(result.monitor.retentionMs).to.equal(0);
    expect(result.router.breakerRecoveryMs).to.equal(0);
    expect(resolveDefaultOptions({ HUB_RETENTION_MS: "0", HUB_BREAKER_RECOVERY_MS: "0" }).monitor.retentionMs).to.equal(0);
    expect(() => parseGatewayRuntimeOptions(["--retention-ms", "-1"], {})).to.throw(
      "The value -1 for --retention-ms must be a non-negative integer.",
    );
  });

  it("ignores positional arguments", () => {
    expect(parseGatewayRuntimeOptions(["serve", "--http"], {}).http.enabled).to.equal(true);
  });

  it("rejects invalid values with the offending flag", () => {
    expect(() => parseGatewayRuntimeOptions(["--http-port", "0"], {})).to.throw(
      "The value 0 for --http-port must be a positive integer.",
    );
    expect(() => parseGatewayRuntimeOptions(["--max-concurrent", "1.5"], {})).to.throw(
      "The value 1.5 for --max-concurrent must be a positive integer.",
    );
    expect(() => parseGatewayRuntimeOptions(["--load-policy", "random"], {})).to.throw(
      "The value random for --load-policy must be one of",
    );
    expect(() => parseGatewayRuntimeOptions(["--log-file="], {})).to.throw("The flag --log-file requires a value.");
    expect(() => parseGatewayRuntimeOptions(["--ledger-file", "--http"], {})).to.throw(
      "The flag --ledger-file requires a value.",
    );
    expect(() => parseGatewayRuntimeOptions(["--verbose"], {})).to.throw("Unknown flag --verbose.");
  });
});

describe("resolveDefaultOptions", () => {
  it("reads HUB_* variables and ignores malformed ones", () => {
    const result = resolveDefaultOptions({
      HUB_HTTP_PORT: "8123",
      HUB_HTTP_HOST: "  ",
      HUB_PROBE_INTERVAL_MS: "abc",
      HUB_FAILURE_THRESHOLD: "0",
      HUB_MAX_CONCURRENT: "64",
      HUB_LOAD_POLICY: "LEAST-LOAD",
      HUB_LEDGER_FILE: "/var/lib/hub/ledger.jsonl",
    });

    expect(result.http).to.deep.equal({ enabled: true, port: 8123, host: "127.0.0.1" });
    expect(result.monitor.probeIntervalMs).to.equal(30_000);
    expect(result.monitor.failureThreshold).to.equal(3);
    expect(result.router.maxConcurrent).to.equal(64);
    expect(result.router.loadPolicy).to.equal("least-load");
    expect(result.ledgerFile).to.equal("/var/lib/hub/ledger.jsonl");
  });

  it("lets CLI flags override the environment", () => {
    const result = parseGatewayRuntimeOptions(["--max-concurrent", "3"], { HUB_MAX_CONCURRENT: "64" });
    expect(result.router.maxConcurrent).to.equal(3);
  });
});
