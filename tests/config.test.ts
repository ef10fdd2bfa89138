import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";
import { DEFAULT_USER_AGENT, loadConfig } from "../src/config.js";
import { runDoctor } from "../src/diagnostics/doctor.js";
import { ConfigError } from "../src/errors.js";

const baseEnv = {
  MIRROR_API_KEY: "test-key",
  MIRROR_SESSION_COOKIE: "test-cookie",
  MIRROR_ROOT_NODE_ID: "root",
  MIRROR_BASE_URL: "https://photos.example.test/"
};

describe("loadConfig", () => {
  it("reads required settings and applies defaults", () => {
    const config = loadConfig({}, baseEnv);

    assert.deepEqual(config, {
      apiKey: "test-key",
      sessionCookie: "test-cookie",
      rootNodeId: "root",
      baseUrl: "https://photos.example.test",
      outputDir: process.cwd(),
      userAgent: DEFAULT_USER_AGENT,
      fetchRetries: 3,
      retryDelayMs: 500,
      pageRetryLimit: 0,
      pageRetryDelayMs: 1000,
      progress: true,
      logLevel: "info"
    });
  });

  it("lets command-line values win over the environment", () => {
    const config = loadConfig(
      { apiKey: "flag-key", nodeId: "other", outputDir: "/tmp/mirror", pageRetryLimit: "5", progress: false },
      { ...baseEnv, MIRROR_PAGE_RETRY_LIMIT: "2" }
    );

    assert.equal(config.apiKey, "flag-key");
    assert.equal(config.rootNodeId, "other");
    assert.equal(config.outputDir, "/tmp/mirror");
    assert.equal(config.pageRetryLimit, 5);
    assert.equal(config.progress, false);
  });

  it("names every missing credential", () => {
    assert.throws(
      () => loadConfig({}, { MIRROR_BASE_URL: "https://photos.example.test", MIRROR_SESSION_COOKIE: "" }),
      (error) => {
        assert.ok(error instanceof ConfigError);
        assert.deepEqual(error.issues, [
          "MIRROR_API_KEY: missing API key (set it or pass --api-key)",
          "MIRROR_SESSION_COOKIE: missing session cookie (set it or pass --session-cookie)",
          "MIRROR_ROOT_NODE_ID: missing root node id (set it or pass --node-id)"
        ]);
        return true;
      }
    );
  });

  it("rejects a blank flag value", () => {
    assert.throws(() => loadConfig({ apiKey: "   " }, baseEnv), (error) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.issues, ["MIRROR_API_KEY: missing API key (set it or pass --api-key)"]);
      return true;
    });
  });

  it("rejects a base URL that is not absolute", () => {
    assert.throws(() => loadConfig({}, { ...baseEnv, MIRROR_BASE_URL: "photos" }), (error) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.issues, ["MIRROR_BASE_URL: must be an absolute http(s) URL"]);
      return true;
    });
  });

  it("rejects a non-numeric page retry limit", () => {
    assert.throws(() => loadConfig({ pageRetryLimit: "many" }, baseEnv), ConfigError);
  });
});

describe("runDoctor", () => {
  it("passes a complete environment with warnings for a short cookie and unbounded retries", async () => {
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "album-mirror-doctor-"));
    try {
      const report = runDoctor({ ...baseEnv, MIRROR_OUTPUT_DIR: outputDir });

      assert.equal(report.ok, true);
      assert.deepEqual(report.summary, { errors: 0, warnings: 2 });
      const failing = report.checks.filter((check) => !check.ok).map((check) => check.name);
      assert.deepEqual(failing, ["remote:session_cookie_shape", "walk:page_retry_bounded"]);
      const urlCheck = report.checks.find((check) => check.name === "url:MIRROR_BASE_URL");
      assert.equal(urlCheck?.detail, "MIRROR_BASE_URL=https://photos.example.test");
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  });

  it("fails when a credential is missing or a number is malformed", async () => {
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "album-mirror-doctor-"));
    try {
      const report = runDoctor({
        MIRROR_API_KEY: "test-key",
        MIRROR_SESSION_COOKIE: "test-cookie-0123456789",
        MIRROR_ROOT_NODE_ID: "root",
        MIRROR_FETCH_RETRIES: "-1",
        MIRROR_PAGE_RETRY_LIMIT: "5",
        MIRROR_OUTPUT_DIR: outputDir
      });

      assert.equal(report.ok, false);
      const failing = report.checks.filter((check) => !check.ok).map((check) => check.name);
      assert.deepEqual(failing, ["required:MIRROR_BASE_URL", "url:MIRROR_BASE_URL", "number:MIRROR_FETCH_RETRIES"]);
      assert.deepEqual(report.summary, { errors: 3, warnings: 0 });
      const urlCheck = report.checks.find((check) => check.name === "url:MIRROR_BASE_URL");
      assert.equal(urlCheck?.detail, "MIRROR_BASE_URL is not set; the remote tree cannot be listed without it");
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  });
});
