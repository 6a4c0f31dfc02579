import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { HttpMethod } from "../../shared/contracts.js";
import { InvalidParameterError } from "../services/cad-calls-request-builder.js";
import { EXIT_CODES, runCadCallsFetch } from "../services/cad-calls-service.js";
import type { PortalFetch } from "../services/cad-calls-transport.js";
import { formatCadCalls } from "../utils/cad-calls-display.js";
import { loadCadCallsConfig, type CadCallsConfig } from "./pipeline-config.js";

interface CadCallsCliOptions {
  agencyId?: string;
  open?: boolean;
  closed?: boolean;
  take?: string;
  skip?: string;
  search?: string;
  method?: HttpMethod;
  output?: string;
  outputDir?: string;
  quiet?: boolean;
}

export interface CadCallsCliDependencies {
  env?: NodeJS.ProcessEnv;
  loadConfig?: (env: NodeJS.ProcessEnv) => CadCallsConfig;
  fetchImpl?: PortalFetch;
  now?: () => Date;
  print?: (message: string) => void;
  printError?: (message: string) => void;
}

const parseHttpMethod = (value: string): HttpMethod => {
  const normalized = value.trim().toUpperCase();
  if (normalized === "POST" || normalized === "GET") {
    return normalized;
  }
  throw new InvalidArgumentError("Expected POST or GET.");
};

const createProgram = (
  print: (message: string) => void,
  printError: (message: string) => void
): Command =>
  new Command()
    .name("fetch-cad-calls")
    .description("Fetch CAD calls from a Police-to-Citizen portal and save them as JSON")
    .option("--agency-id <id>", "agency id (default: CAD_AGENCY_ID)")
    .option("--open", "include open calls (default: CAD_INCLUDE_OPEN)")
    .option("--no-open", "exclude open calls")
    .option("--closed", "include closed calls (default: CAD_INCLUDE_CLOSED)")
    .option("--no-closed", "exclude closed calls")
    .option("--take <count>", "number of records to retrieve (default: CAD_TAKE)")
    .option("--skip <count>", "number of records to skip (default: CAD_SKIP)")
    .option("--search <text>", "search text to filter calls")
    .option("--method <method>", "POST (JSON body) or GET (query string)", parseHttpMethod)
    .option("--output <path>", "write the result file to this exact path")
    .option("--output-dir <directory>", "directory for generated result and debug files")
    .option("-q, --quiet", "suppress console output")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => print(text.trimEnd()),
      writeErr: (text) => printError(text.trimEnd())
    });

const runWithOptions = async (
  options: CadCallsCliOptions,
  dependencies: CadCallsCliDependencies,
  print: (message: string) => void,
  printError: (message: string) => void
): Promise<number> => {
  const quiet = Boolean(options.quiet);

  let config: CadCallsConfig;
  try {
    config = (dependencies.loadConfig ?? loadCadCallsConfig)(dependencies.env ?? process.env);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      printError(`[cad-calls] ${error.message}`);
      return EXIT_CODES.invalidParameters;
    }
    throw error;
  }

  const result = await runCadCallsFetch(
    {
      agencyId: options.agencyId,
      includeOpen: options.open,
      includeClosed: options.closed,
      take: options.take,
      skip: options.skip,
      searchText: options.search,
      transportMethod: options.method
        ? options.method === "GET" ? "FALLBACK" : "PRIMARY"
        : undefined,
      outputPath: options.output ?? null,
      outputDirectory: options.outputDir ?? null
    },
    {
      config,
      fetchImpl: dependencies.fetchImpl,
      now: dependencies.now,
      log: quiet ? () => {} : print,
      logError: printError
    }
  );

  if (result.status === "success" && !quiet) {
    print("");
    for (const line of formatCadCalls(result.resultSet)) {
      print(line);
    }
    print(`Saved ${result.resultSet.records.length} call(s) to ${result.artifactPath}`);
  }

  return result.exitCode;
};

/**
 * Parse argv, load configuration and run one fetch. Resolves to the process
 * exit code; never calls process.exit itself. Anything thrown past the
 * expected failure paths becomes EXIT_CODES.internalError.
 */
export const runCadCallsCli = async (
  argv: string[],
  dependencies: CadCallsCliDependencies = {}
): Promise<number> => {
  const print = dependencies.print ?? ((message: string) => console.log(message));
  const printError = dependencies.printError ?? ((message: string) => console.error(message));
  const program = createProgram(print, printError);

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.invalidParameters;
    }
    throw error;
  }

  try {
    return await runWithOptions(program.opts<CadCallsCliOptions>(), dependencies, print, printError);
  } catch (error) {
    printError(
      `[cad-calls] Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
    return EXIT_CODES.internalError;
  }
};

