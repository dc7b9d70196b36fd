import fs from "fs";
import archiver from "archiver";
import AdmZip from "adm-zip";
import { spawn } from "child_process";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { type Logger, silentLogger } from "./logging.js";

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  cwd?: string,
  env?: Record<string, string>
) => Promise<CommandResult>;

/** Zips everything below `sourceDir`, dotfiles included, except `exclusions`. */
export function zipDirectory(
  sourceDir: string,
  outPath: string,
  exclusions: string[] = []
): Promise<void> {
  const archive = archiver("zip", { zlib: { level: 9 } });
  const output = fs.createWriteStream(outPath);

  return new Promise<void>((resolve, reject) => {
    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);

    archive.pipe(output);
    archive.glob("**/*", {
      cwd: sourceDir,
      dot: true,
      ignore: exclusions,
      skip: exclusions,
    });
    archive.finalize().catch(reject);
  });
}

/**
 * Extracts every entry of a zip archive below `outDir`, keeping the paths
 * recorded in the archive and overwriting anything already there.
 */
export function unzipArchive(sourcePath: string, outDir: string) {
  const zip = new AdmZip(sourcePath);
  zip.extractAllTo(outDir, true);
}

export function runNewProcessWithResult(
  command: string,
  args: string[],
  cwd = ".",
  env: Record<string, string> = {},
  logger: Logger = silentLogger
): Promise<CommandResult> {
  return new Promise(function (resolve) {
    logger.debug("Running", command, ...args);
    const child = spawn(command, args, {
      cwd,
      env: { ...process.env, ...env },
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
      logger.debug("stdout", data.toString());
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      logger.debug("stderr", data.toString());
    });

    child.on("close", (code) => {
      resolve({ code, stdout, stderr });
    });

    // spawn failures (e.g. ENOENT) never produce an exit code
    child.on("error", (err: Error) => {
      resolve({ code: null, stdout, stderr: stderr + err.message });
    });

    child.stdin.end();
  });
}

export function createRunner(logger: Logger): CommandRunner {
  return (command, args, cwd, env) =>
    runNewProcessWithResult(command, args, cwd, env, logger);
}

/** Writes `content` to `file`, creating its parent directories first. */
export async function writeToFile(file: string, content: string | Buffer) {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content);
}
