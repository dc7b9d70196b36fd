import fs from "fs";
import path from "path";
import { DeleteError, StagingError, SyncError, exitCodeOf } from "./errors.js";
import { fileExtension, fileName, isFile } from "./files.js";
import { type Logger, silentLogger } from "./logging.js";
import {
  type CommandResult,
  type CommandRunner,
  createRunner,
  unzipArchive,
} from "./utils.js";

export const STAGING_DIR_NAME = "temp_copyfiles";

export type BucketOptions = {
  runner?: CommandRunner;
  logger?: Logger;
  /** Directory the staging area is created in. */
  workingDir?: string;
  /** Overrides `<workingDir>/temp_copyfiles`, e.g. to run syncs in parallel. */
  stagingDir?: string;
};

function prefixUrl(bucket: string, prefix: string): string {
  return `s3://${bucket}/${prefix}${prefix ? "/" : ""}`;
}

function stagingDirOf(options: BucketOptions): string {
  return (
    options.stagingDir ??
    path.join(options.workingDir ?? process.cwd(), STAGING_DIR_NAME)
  );
}

/**
 * Recreates the staging directory and fills it with `files`. Zip archives
 * are expanded with their internal paths, anything else is copied flat into
 * the root. Later entries overwrite earlier ones.
 */
export function stageFiles(
  stagingDir: string,
  files: string[],
  logger: Logger = silentLogger
) {
  fs.rmSync(stagingDir, { recursive: true, force: true });
  fs.mkdirSync(stagingDir, { recursive: true });

  for (const file of files) {
    if (!file) {
      continue;
    }
    if (!isFile(file)) {
      throw new StagingError(`${file} missing`);
    }

    try {
      if (fileExtension(file) === "zip") {
        logger.debug("Expanding", file, "into", stagingDir);
        unzipArchive(file, stagingDir);
      } else {
        fs.copyFileSync(file, path.join(stagingDir, fileName(file)));
      }
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new StagingError(`Unable to stage ${file}: ${reason}`);
    }
  }
}

export async function syncFilesToBucket(
  region: string,
  bucket: string,
  prefix: string,
  files: string[],
  optionalArguments: string[] = [],
  options: BucketOptions = {}
): Promise<CommandResult> {
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? createRunner(logger);
  const stagingDir = stagingDirOf(options);

  stageFiles(stagingDir, files, logger);

  const target = prefixUrl(bucket, prefix);
  logger.info("Syncing", files.filter(Boolean).join(" "), "to", target);
  const result = await runner("aws", [
    "--region",
    region,
    "s3",
    "sync",
    ...optionalArguments,
    `${stagingDir}/`,
    target,
  ]);

  if (result.code !== 0) {
    throw new SyncError(
      `Unable to sync to ${target}: ${result.stderr.trim()}`,
      exitCodeOf(result.code)
    );
  }
  return result;
}

/** Deletes every object below `prefix`, which is always slash-terminated once. */
export async function deleteTreeFromBucket(
  region: string,
  bucket: string,
  prefix: string,
  optionalArguments: string[] = [],
  options: BucketOptions = {}
): Promise<CommandResult> {
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? createRunner(logger);

  const tree = prefix.replace(/\/+$/, "");
  if (!tree) {
    throw new DeleteError(`Refusing to delete all of s3://${bucket}/`);
  }

  const target = prefixUrl(bucket, tree);
  logger.info("Deleting", target);
  const result = await runner("aws", [
    "--region",
    region,
    "s3",
    "rm",
    ...optionalArguments,
    "--recursive",
    target,
  ]);

  if (result.code !== 0) {
    throw new DeleteError(
      `Unable to delete ${target}: ${result.stderr.trim()}`,
      exitCodeOf(result.code)
    );
  }
  return result;
}

export async function isBucketAccessible(
  region: string,
  bucket: string,
  prefix: string,
  options: BucketOptions = {}
): Promise<boolean> {
  const runner = options.runner ?? createRunner(options.logger ?? silentLogger);
  const result = await runner("aws", [
    "--region",
    region,
    "s3",
    "ls",
    prefixUrl(bucket, prefix),
  ]);
  return result.code === 0;
}
