import path from "path";
import { Command } from "commander";
import type { AutomationConfig } from "./config.js";
import { AutomationError } from "./errors.js";
import { cleanup, findAncestorDir } from "./files.js";
import { manageImages } from "./images.js";
import type { Logger } from "./logging.js";
import { deleteTreeFromBucket, isBucketAccessible, syncFilesToBucket } from "./s3.js";
import { type CommandRunner, zipDirectory } from "./utils.js";

export type CliDependencies = {
  config: AutomationConfig;
  runner: CommandRunner;
  logger: Logger;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram({ config, runner, logger }: CliDependencies) {
  const program = new Command();
  const bucketOptions = { runner, logger, workingDir: config.workingDir };

  program
    .name("image-tools")
    .description("Package build images and sync them to S3");

  program
    .command("manage-images")
    .description("Manage images corresponding to the current build")
    .option("-f, --formats <formats>", "separated list of image formats to manage")
    .option("-g, --commit <commit>", "code commit the images belong to")
    .option("-u, --unit <unit>", "deployment unit associated with the images")
    .action(async (options: { formats?: string; commit?: string; unit?: string }) => {
      await manageImages(
        {
          deploymentUnit: options.unit,
          codeCommit: options.commit,
          imageFormats: options.formats,
        },
        config,
        runner,
        logger
      );
    });

  program
    .command("sync")
    .description("Stage files (expanding zips) and sync them to a bucket prefix")
    .requiredOption("-r, --region <region>", "bucket region")
    .requiredOption("-b, --bucket <bucket>", "bucket name")
    .option("-p, --prefix <prefix>", "key prefix", "")
    .option("--delete", "delete remote objects that are not staged")
    .option("--dryrun", "only report what would change")
    .option("-a, --arg <arg>", "extra argument for aws s3 sync", collect, [])
    .argument("[files...]", "files to stage")
    .action(
      async (
        files: string[] | undefined,
        options: {
          region: string;
          bucket: string;
          prefix: string;
          delete?: boolean;
          dryrun?: boolean;
          arg: string[];
        }
      ) => {
        const args = [
          ...(options.delete ? ["--delete"] : []),
          ...(options.dryrun ? ["--dryrun"] : []),
          ...options.arg,
        ];
        await syncFilesToBucket(
          options.region,
          options.bucket,
          options.prefix,
          (files ?? []).map((file) => path.resolve(config.workingDir, file)),
          args,
          bucketOptions
        );
      }
    );

  program
    .command("delete-tree")
    .description("Delete everything below a bucket prefix")
    .requiredOption("-r, --region <region>", "bucket region")
    .requiredOption("-b, --bucket <bucket>", "bucket name")
    .requiredOption("-p, --prefix <prefix>", "key prefix")
    .option("--dryrun", "only report what would be deleted")
    .action(
      async (options: {
        region: string;
        bucket: string;
        prefix: string;
        dryrun?: boolean;
      }) => {
        await deleteTreeFromBucket(
          options.region,
          options.bucket,
          options.prefix,
          options.dryrun ? ["--dryrun"] : [],
          bucketOptions
        );
      }
    );

  program
    .command("bucket-accessible")
    .description("Check that a bucket prefix can be listed")
    .requiredOption("-r, --region <region>", "bucket region")
    .requiredOption("-b, --bucket <bucket>", "bucket name")
    .option("-p, --prefix <prefix>", "key prefix", "")
    .action(async (options: { region: string; bucket: string; prefix: string }) => {
      const accessible = await isBucketAccessible(
        options.region,
        options.bucket,
        options.prefix,
        bucketOptions
      );
      if (!accessible) {
        throw new AutomationError(
          `s3://${options.bucket}/${options.prefix} is not accessible`
        );
      }
    });

  program
    .command("package")
    .description("Zip a build directory into an image archive")
    .argument("<sourceDir>", "directory to archive")
    .argument("<outFile>", "zip file to write")
    .option("-x, --exclude <pattern>", "glob to leave out", collect, [])
    .action(async (sourceDir: string, outFile: string, options: { exclude: string[] }) => {
      await zipDirectory(
        path.resolve(config.workingDir, sourceDir),
        path.resolve(config.workingDir, outFile),
        options.exclude
      );
      logger.info("Packaged", sourceDir, "into", outFile);
    });

  program
    .command("find-ancestor")
    .description("Print the closest ancestor named, or holding a file named, <marker>")
    .argument("<marker>", "directory name or marker file")
    .argument("[startDir]", "where to start looking")
    .action((marker: string, startDir?: string) => {
      console.log(findAncestorDir(marker, startDir ?? config.workingDir));
    });

  program
    .command("cleanup")
    .description("Remove temporary files left behind by pipeline steps")
    .argument("[rootDir]", "directory to clean")
    .action((rootDir?: string) => {
      const removed = cleanup(rootDir ?? config.workingDir);
      logger.debug("Removed", removed.join(" "));
    });

  return program;
}
