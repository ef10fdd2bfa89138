import fs from "node:fs";
import path from "node:path";
import { config as dotenvConfig } from "dotenv";

dotenvConfig();

export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail: string;
  severity: "error" | "warn";
}

export interface DoctorReport {
  timestamp: string;
  ok: boolean;
  checks: DoctorCheck[];
  summary: {
    errors: number;
    warnings: number;
  };
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"];

export function runDoctor(env: NodeJS.ProcessEnv = process.env): DoctorReport {
  const checks: DoctorCheck[] = [];

  const required = ["MIRROR_API_KEY", "MIRROR_SESSION_COOKIE", "MIRROR_ROOT_NODE_ID", "MIRROR_BASE_URL"] as const;

  for (const key of required) {
    const value = env[key];
    checks.push({
      name: `required:${key}`,
      ok: Boolean(value && value.trim().length > 0),
      detail: value ? "present" : "missing",
      severity: "error"
    });
  }

  checks.push(validateUrl(env, "MIRROR_BASE_URL"));

  for (const key of ["MIRROR_FETCH_RETRIES", "MIRROR_RETRY_DELAY_MS", "MIRROR_PAGE_RETRY_LIMIT", "MIRROR_PAGE_RETRY_DELAY_MS"]) {
    const value = env[key];
    if (value === undefined || value === "") continue;
    const parsed = Number(value);
    checks.push({
      name: `number:${key}`,
      ok: Number.isInteger(parsed) && parsed >= 0,
      detail: `${key}=${value}`,
      severity: "error"
    });
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  checks.push({
    name: "log:level_known",
    ok: LOG_LEVELS.includes(logLevel),
    detail: `LOG_LEVEL=${logLevel}`,
    severity: "error"
  });

  const cookie = env.MIRROR_SESSION_COOKIE ?? "";
  checks.push({
    name: "remote:session_cookie_shape",
    ok: cookie.length >= 16,
    detail: cookie.length >= 16 ? `length ${cookie.length}` : "too short or missing",
    severity: "warn"
  });

  const pageRetryLimit = env.MIRROR_PAGE_RETRY_LIMIT ?? "0";
  checks.push({
    name: "walk:page_retry_bounded",
    ok: pageRetryLimit !== "0",
    detail: pageRetryLimit === "0" ? "unbounded: a persistently broken page is retried forever" : `limit ${pageRetryLimit}`,
    severity: "warn"
  });

  checks.push(checkOutputDir(env.MIRROR_OUTPUT_DIR ?? "."));

  const errors = checks.filter((c) => !c.ok && c.severity === "error").length;
  const warnings = checks.filter((c) => !c.ok && c.severity === "warn").length;

  return {
    timestamp: new Date().toISOString(),
    ok: errors === 0,
    checks,
    summary: {
      errors,
      warnings
    }
  };
}

function validateUrl(env: NodeJS.ProcessEnv, envKey: string): DoctorCheck {
  const value = env[envKey];
  if (!value) {
    return {
      name: `url:${envKey}`,
      ok: false,
      detail: `${envKey} is not set; the remote tree cannot be listed without it`,
      severity: "error"
    };
  }

  try {
    const parsed = new URL(value);
    const ok = parsed.protocol === "http:" || parsed.protocol === "https:";
    return {
      name: `url:${envKey}`,
      ok,
      detail: ok ? `${envKey}=${parsed.origin}` : `${envKey} must use http or https, got ${parsed.protocol}`,
      severity: "error"
    };
  } catch {
    return {
      name: `url:${envKey}`,
      ok: false,
      detail: `${envKey} is not an absolute URL: ${value}`,
      severity: "error"
    };
  }
}

function checkOutputDir(dir: string): DoctorCheck {
  const resolved = path.resolve(dir);
  // the closest existing ancestor is what mkdir will need to write into
  let probe = resolved;
  while (!fs.existsSync(probe) && path.dirname(probe) !== probe) {
    probe = path.dirname(probe);
  }

  try {
    fs.accessSync(probe, fs.constants.W_OK);
    return { name: "fs:output_dir_writable", ok: true, detail: resolved, severity: "error" };
  } catch {
    return { name: "fs:output_dir_writable", ok: false, detail: `${probe} is not writable`, severity: "error" };
  }
}
