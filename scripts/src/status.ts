import axios from "axios";
import type { AutomationConfig } from "./config.js";
import type { Logger } from "./logging.js";
import { writeToFile } from "./utils.js";

export type StatusEntry = {
  status: string;
  message: string;
  time: string;
};

export const ImageStatus = {
  SCHEDULED: "SCHEDULED",
  PACKAGING: "PACKAGING",
  SUCCESS: "SUCCEEDED",
  FAILED: "FAILED",
} as const;

export type ImageStatus = (typeof ImageStatus)[keyof typeof ImageStatus];

/**
 * Keeps the history of a pipeline step in the status file and, when a
 * status URL is configured, posts each new entry to `<url>/report`.
 */
export class StatusReporter {
  readonly entries: StatusEntry[] = [];

  constructor(
    private readonly config: Pick<
      AutomationConfig,
      "statusFile" | "statusUrl" | "statusSecret"
    >,
    private readonly logger: Logger
  ) {}

  async addStatus(status: ImageStatus, message: string) {
    const newStatus = { status, message, time: new Date().toISOString() };
    this.entries.push(newStatus);
    this.logger.debug("Adding status", status, message);
    await this.reportWebHook(newStatus);
    try {
      await writeToFile(this.config.statusFile, JSON.stringify(this.entries));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.warning("Failed to write status file", reason);
    }
  }

  private async reportWebHook(newStatus: StatusEntry) {
    if (!this.config.statusUrl) {
      return;
    }
    const reportURL = `${this.config.statusUrl}/report`;

    try {
      this.logger.debug(
        `Reporting status [${newStatus.status}:${newStatus.message}] to ${reportURL}`
      );
      await axios.post(reportURL, newStatus, {
        headers: {
          "Content-Type": "application/json",
          ...(this.config.statusSecret
            ? { Authorization: `Bearer ${this.config.statusSecret}` }
            : {}),
        },
      });
    } catch (e) {
      const reason = axios.isAxiosError(e) ? e.code ?? e.message : String(e);
      this.logger.warning("Failed to report status", reason);
    }
  }
}
