import type { DriverResponse } from "@pkgdriver/shared";
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
} from "../config/configLoader.utils.js";
import { consoleLogger } from "../logging/ConsoleDriverLogger.js";
import type { DriverLogger } from "../logging/DriverLogger.js";
import { parseRequest } from "./loadPackageFiles.js";
import { runDriver } from "./runDriver.js";

const readStdin = async (): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
};

const writeStdout = (text: string): void => {
  process.stdout.write(text);
};

export interface StartDriverOptions {
  logger?: DriverLogger;
  /** Directory searched for the config file (default: working directory) */
  directory?: string;
  readInput?: () => Promise<string>;
  writeOutput?: (text: string) => void;
  env?: Record<string, string | undefined>;
}

/**
 * Answer one driver invocation: request on stdin, patterns in `args`,
 * response on stdout.
 *
 * Without a config file the request is answered with `NotHandled` so the
 * caller falls back to its own loading. Failures are reported through the
 * logger and nothing is written.
 *
 * @returns the process exit code
 */
export const startDriver = async (
  args: string[],
  {
    logger = consoleLogger,
    directory = process.cwd(),
    readInput = readStdin,
    writeOutput = writeStdout,
    env = process.env,
  }: StartDriverOptions = {},
): Promise<number> => {
  const writeResponse = (response: DriverResponse): void => {
    writeOutput(JSON.stringify(response));
  };

  try {
    const request = parseRequest(await readInput());

    const configPath = findConfigFile(directory);
    if (!configPath) {
      logger.warn(`No ${CONFIG_FILE_NAME} found in ${directory}. Not handled.`);
      writeResponse({ NotHandled: true });
      return 0;
    }

    const config = loadConfig(configPath);
    writeResponse(runDriver({ config, request, patterns: args, logger, env }));
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
};
