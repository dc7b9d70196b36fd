import path from "path";
import { type AutomationConfig, requireConfig } from "./config.js";
import {
  PackagingError,
  UsageError,
  cantProceedMessage,
  exitCodeOf,
} from "./errors.js";
import { findFile, formatPath, isFile } from "./files.js";
import type { Logger } from "./logging.js";
import { ImageStatus, StatusReporter } from "./status.js";
import { splitOnAny } from "./strings.js";
import type { CommandRunner } from "./utils.js";

export const IMAGE_FORMATS = [
  "dataset",
  "rdssnapshot",
  "docker",
  "lambda",
  "pipeline",
  "scripts",
  "swagger",
  "spa",
  "contentnode",
] as const;

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export type ImageRequest = {
  deploymentUnit?: string;
  codeCommit?: string;
  imageFormats?: string;
};

export type PackagingContext = {
  config: AutomationConfig;
  deploymentUnit: string;
  codeCommit: string;
};

export type ScriptInvocation = {
  script: string;
  args: string[];
};

/** Turns one image format into a call of its management script. */
export interface Packager {
  readonly format: ImageFormat;
  prepare(context: PackagingContext): ScriptInvocation;
}

function buildSrcFile(context: PackagingContext, ...parts: string[]): string {
  const { buildSrcDir } = requireConfig(context.config, ["buildSrcDir"]);
  return path.join(buildSrcDir, ...parts);
}

function requireImageFile(file: string): string {
  if (!isFile(file)) {
    throw new PackagingError(`${file} missing`);
  }
  return file;
}

/** Formats shipped as `dist/<format>.zip` and handed over with `-f`. */
class ArchivePackager implements Packager {
  constructor(
    readonly format: ImageFormat,
    private readonly script: string
  ) {}

  prepare(context: PackagingContext): ScriptInvocation {
    const imageFile = requireImageFile(
      buildSrcFile(context, "dist", `${this.format}.zip`)
    );
    return {
      script: this.script,
      args: [
        "-s",
        "-u",
        context.deploymentUnit,
        "-g",
        context.codeCommit,
        "-f",
        imageFile,
      ],
    };
  }
}

const datasetPackager: Packager = {
  format: "dataset",
  prepare(context) {
    const imageFile = requireImageFile(
      buildSrcFile(context, "cot_data_file_manifest.json")
    );
    const { s3DataStage } = requireConfig(context.config, ["s3DataStage"]);
    return {
      script: "manageDataSetS3.sh",
      args: [
        "-s",
        "-u",
        context.deploymentUnit,
        "-g",
        context.codeCommit,
        "-f",
        imageFile,
        "-b",
        s3DataStage,
      ],
    };
  },
};

const rdsSnapshotPackager: Packager = {
  format: "rdssnapshot",
  prepare(context) {
    return {
      script: "manageDataSetRDSSnapshot.sh",
      args: ["-s", "-u", context.deploymentUnit, "-g", context.codeCommit],
    };
  },
};

const dockerPackager: Packager = {
  format: "docker",
  prepare(context) {
    const { buildDevopsDir } = context.config;
    const candidates = [
      ...(buildDevopsDir ? [formatPath(buildDevopsDir, "docker", "Dockerfile")] : []),
      buildSrcFile(context, "Dockerfile"),
    ];
    if (!findFile(candidates, { cwd: context.config.workingDir })) {
      throw new PackagingError("Dockerfile missing");
    }
    return {
      script: "manageDocker.sh",
      args: ["-b", "-s", context.deploymentUnit, "-g", context.codeCommit],
    };
  },
};

export const PACKAGERS: Record<ImageFormat, Packager> = {
  dataset: datasetPackager,
  rdssnapshot: rdsSnapshotPackager,
  docker: dockerPackager,
  lambda: new ArchivePackager("lambda", "manageLambda.sh"),
  pipeline: new ArchivePackager("pipeline", "managePipeline.sh"),
  scripts: new ArchivePackager("scripts", "manageScripts.sh"),
  swagger: new ArchivePackager("swagger", "manageSwagger.sh"),
  spa: new ArchivePackager("spa", "manageSpa.sh"),
  contentnode: new ArchivePackager("contentnode", "manageContentNode.sh"),
};

export function isImageFormat(value: string): value is ImageFormat {
  return IMAGE_FORMATS.some((format) => format === value);
}

export function parseImageFormats(
  formats: string,
  separators: string
): ImageFormat[] {
  return splitOnAny(formats, separators).map((entry) => {
    const format = entry.trim().toLowerCase();
    if (!isImageFormat(format)) {
      throw new UsageError(`Unsupported image format "${entry}"`);
    }
    return format;
  });
}

/** Fills unset request fields from the first entry of each configured list. */
export function resolveImageRequest(
  request: ImageRequest,
  config: AutomationConfig
): { deploymentUnit: string; codeCommit: string; imageFormats: string } {
  const deploymentUnit = request.deploymentUnit || config.deploymentUnits[0];
  const codeCommit = request.codeCommit || config.codeCommits[0];
  const imageFormats = request.imageFormats || config.imageFormats[0];

  if (!deploymentUnit || !codeCommit || !imageFormats) {
    throw new UsageError(
      "Mandatory arguments missing. Check usage via -h option."
    );
  }
  return { deploymentUnit, codeCommit, imageFormats };
}

export async function manageImages(
  request: ImageRequest,
  config: AutomationConfig,
  runner: CommandRunner,
  logger: Logger,
  reporter: StatusReporter = new StatusReporter(config, logger)
) {
  const { deploymentUnit, codeCommit, imageFormats } = resolveImageRequest(
    request,
    config
  );
  const formats = parseImageFormats(imageFormats, config.imageFormatSeparators);
  if (formats.length === 0) {
    throw new UsageError(cantProceedMessage("No image formats given."));
  }
  const { automationDir } = requireConfig(config, ["automationDir"]);
  const context: PackagingContext = { config, deploymentUnit, codeCommit };

  await reporter.addStatus(
    ImageStatus.SCHEDULED,
    `Managing ${formats.join(",")} images for ${deploymentUnit}`
  );

  try {
    for (const format of formats) {
      await reporter.addStatus(ImageStatus.PACKAGING, `Packaging ${format}`);
      const { script, args } = PACKAGERS[format].prepare(context);
      logger.info("Managing", format, "image for", deploymentUnit);

      const result = await runner(
        path.join(automationDir, script),
        args,
        config.workingDir
      );
      if (result.code !== 0) {
        throw new PackagingError(
          `${script} failed for ${format}: ${result.stderr.trim()}`,
          exitCodeOf(result.code)
        );
      }
    }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    await reporter.addStatus(ImageStatus.FAILED, reason);
    throw e;
  }

  await reporter.addStatus(ImageStatus.SUCCESS, "Images managed successfully");
  return formats;
}
