import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { silentLogger } from "../logging.js";
import { ImageStatus, StatusReporter } from "../status.js";

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock("axios", () => ({
  default: {
    post,
    isAxiosError: () => false,
  },
}));

describe("StatusReporter", () => {
  let tempDir: string;
  let statusFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "status-test-"));
    statusFile = path.join(tempDir, "out", "STATUS.txt");
    post.mockReset();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const readStatuses = () => JSON.parse(fs.readFileSync(statusFile, "utf-8"));

  it("should write the whole history to the status file", async () => {
    const reporter = new StatusReporter({ statusFile }, silentLogger);

    await reporter.addStatus(ImageStatus.SCHEDULED, "Managing lambda images");
    await reporter.addStatus(ImageStatus.SUCCESS, "Done");

    expect(readStatuses()).toMatchObject([
      { status: "SCHEDULED", message: "Managing lambda images" },
      { status: "SUCCEEDED", message: "Done" },
    ]);
    expect(post).not.toHaveBeenCalled();
  });

  it("should post each entry to the report webhook", async () => {
    post.mockResolvedValue({ status: 200 });
    const reporter = new StatusReporter(
      {
        statusFile,
        statusUrl: "http://status.test/build",
        statusSecret: "test-secret",
      },
      silentLogger
    );

    await reporter.addStatus(ImageStatus.FAILED, "Dockerfile missing");

    expect(post).toHaveBeenCalledWith(
      "http://status.test/build/report",
      expect.objectContaining({ status: "FAILED", message: "Dockerfile missing" }),
      {
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bearer test-secret",
        },
      }
    );
  });

  it("should keep going when the webhook fails", async () => {
    post.mockRejectedValue(new Error("network down"));
    const warning = vi.fn();
    const reporter = new StatusReporter(
      { statusFile, statusUrl: "http://status.test" },
      { ...silentLogger, warning }
    );

    await reporter.addStatus(ImageStatus.PACKAGING, "Packaging spa");

    expect(warning).toHaveBeenCalledWith(
      "Failed to report status",
      "Error: network down"
    );
    expect(readStatuses()).toHaveLength(1);
  });

  it("should keep going when the status file cannot be written", async () => {
    fs.writeFileSync(path.join(tempDir, "out"), "");
    const warning = vi.fn();
    const reporter = new StatusReporter({ statusFile }, { ...silentLogger, warning });

    await reporter.addStatus(ImageStatus.SCHEDULED, "Managing spa images");

    expect(reporter.entries).toHaveLength(1);
    expect(warning).toHaveBeenCalledWith(
      "Failed to write status file",
      expect.stringMatching(/EEXIST|ENOTDIR/)
    );
  });
});
