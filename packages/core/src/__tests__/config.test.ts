import { describe, it, expect } from "vitest";
import { loadInjectorConfig, loadLauncherConfig } from "../config.js";
import { SidecarError } from "../errors.js";

describe("loadInjectorConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadInjectorConfig({})).toEqual({
      volumeRoot: "/opt/dynatrace",
      stage: "nonprod",
      libraryName: "liboneagentproc.so",
      archivePath: "/image/oneagent.zip",
      healthPort: 8082,
      healthPath: "/healthz",
      lockTimeoutMs: 120000,
    });
  });

  it("should treat empty values as unset", () => {
    const config = loadInjectorConfig({ DT_STAGE: "", HEALTH_PORT: "" });

    expect(config.stage).toBe("nonprod");
    expect(config.healthPort).toBe(8082);
  });

  it("should read overrides from the environment", () => {
    const config = loadInjectorConfig({
      DT_DIR: "/mnt/shared",
      DT_STAGE: "prod",
      ZIP_PATH: "/image/agent-1.2.tar.gz",
      HEALTH_PORT: "9000",
      HEALTH_PATH: "/ready",
      DT_INSTALL_LOCK_TIMEOUT: "5",
    });

    expect(config).toMatchObject({
      volumeRoot: "/mnt/shared",
      stage: "prod",
      archivePath: "/image/agent-1.2.tar.gz",
      healthPort: 9000,
      healthPath: "/ready",
      lockTimeoutMs: 5000,
    });
  });

  it("should reject a non-numeric port", () => {
    expect(() => loadInjectorConfig({ HEALTH_PORT: "http" })).toThrow(
      SidecarError,
    );
  });

  it("should reject a health path without leading slash", () => {
    expect(() => loadInjectorConfig({ HEALTH_PATH: "healthz" })).toThrow(
      "Invalid environment: HEALTH_PATH: must start with '/'",
    );
  });

  it("should reject a stage label that escapes the install root", () => {
    expect(() => loadInjectorConfig({ DT_STAGE: ".." })).toThrow(
      "Invalid environment: DT_STAGE: must not be '.' or '..'",
    );
    expect(() => loadInjectorConfig({ DT_STAGE: "prod/../x" })).toThrow(
      "DT_STAGE: must contain only letters, digits, '.', '_' or '-'",
    );
  });

  it("should report INVALID_CONFIG as error code", () => {
    let thrown: unknown;
    try {
      loadInjectorConfig({ HEALTH_PORT: "70000" });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(SidecarError);
    expect(thrown).toMatchObject({ code: "INVALID_CONFIG" });
  });
});

describe("loadLauncherConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadLauncherConfig({})).toEqual({
      volumeRoot: "/opt/dynatrace",
      stage: "nonprod",
      libraryName: "liboneagentproc.so",
      maxWaitSeconds: 60,
      preloadVar: "LD_PRELOAD",
      diagnostics: true,
    });
  });

  it("should parse diagnostics switches", () => {
    expect(loadLauncherConfig({ DT_DIAGNOSTICS: "0" }).diagnostics).toBe(false);
    expect(loadLauncherConfig({ DT_DIAGNOSTICS: "false" }).diagnostics).toBe(
      false,
    );
    expect(loadLauncherConfig({ DT_DIAGNOSTICS: "1" }).diagnostics).toBe(true);
  });

  it("should reject a fractional wait budget", () => {
    expect(() => loadLauncherConfig({ DT_WAIT_TIMEOUT: "1.5" })).toThrow(
      SidecarError,
    );
  });

  it("should reject an invalid preload variable name", () => {
    expect(() => loadLauncherConfig({ DT_PRELOAD_VAR: "LD PRELOAD" })).toThrow(
      "DT_PRELOAD_VAR: must be a valid variable name",
    );
  });
});
