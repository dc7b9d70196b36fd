import { describe, it, expect } from "vitest";
import { loadConfig, requireConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("config", () => {
  it("should fall back to defaults for an empty environment", () => {
    const config = loadConfig({}, "/work");

    expect(config).toEqual({
      workingDir: "/work",
      automationDir: undefined,
      buildSrcDir: undefined,
      buildDevopsDir: undefined,
      deploymentUnits: [],
      codeCommits: [],
      imageFormats: [],
      imageFormatSeparators: ",",
      s3DataStage: undefined,
      debug: false,
      statusFile: "/work/STATUS.txt",
      statusUrl: undefined,
      statusSecret: undefined,
    });
  });

  it("should read lists and directories from the environment", () => {
    const config = loadConfig(
      {
        AUTOMATION_BUILD_DIR: "build",
        AUTOMATION_DIR: "/automation",
        DEPLOYMENT_UNIT_LIST: "api  web",
        CODE_COMMIT_LIST: "abc123 def456",
        IMAGE_FORMATS_LIST: "docker,lambda",
        IMAGE_FORMAT_SEPARATORS: ",;",
        GENERATION_DEBUG: "true",
        AUTOMATION_STATUS_FILE: "/status/out.json",
      },
      "/work"
    );

    expect(config.workingDir).toBe("/work/build");
    expect(config.automationDir).toBe("/automation");
    expect(config.deploymentUnits).toEqual(["api", "web"]);
    expect(config.codeCommits).toEqual(["abc123", "def456"]);
    expect(config.imageFormats).toEqual(["docker,lambda"]);
    expect(config.imageFormatSeparators).toBe(",;");
    expect(config.debug).toBe(true);
    expect(config.statusFile).toBe("/status/out.json");
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ AUTOMATION_DIR: "  ", S3_DATA_STAGE: "" }, "/work");

    expect(config.automationDir).toBeUndefined();
    expect(config.s3DataStage).toBeUndefined();
  });

  describe("requireConfig", () => {
    it("should return the config when every key is set", () => {
      const config = loadConfig({ AUTOMATION_DIR: "/automation" }, "/work");

      expect(requireConfig(config, ["automationDir"]).automationDir).toBe(
        "/automation"
      );
    });

    it("should list every missing variable", () => {
      const config = loadConfig({}, "/work");

      expect(() =>
        requireConfig(config, ["automationDir", "s3DataStage"])
      ).toThrow(
        new ConfigError(
          "Automation environment is not fully configured. Missing: AUTOMATION_DIR, S3_DATA_STAGE"
        )
      );
    });
  });
});
