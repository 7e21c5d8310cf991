import { readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import { createApiClient, type ApiClient, type HttpMethod } from "./api/client.js";
import {
  CONFIG_FILE_NAME,
  initConfig,
  redactSettings,
  requireConnection,
  resolveSettings,
  type Connection,
  type Settings,
} from "./config.js";
import { openDatabase, type Db } from "./db/connection.js";
import { runMigrations } from "./db/migrate.js";
import { createLogger, LOG_FORMATS, type LogSink, type Logger } from "./logger.js";
import { exportCases } from "./services/exportService.js";
import { createFieldMapping, loadFieldMapping } from "./services/fieldMappingService.js";
import {
  clearImportLogs,
  deleteImportLog,
  getImportLog,
  listImportLogRows,
  listImportLogs,
  saveImportLog,
} from "./services/importLogService.js";
import { formatImportSummary, importCases, previewImport } from "./services/importService.js";
import { buildSectionPaths, resolveSuite } from "./services/sectionService.js";
import { STEPS_FIELDS } from "./types/domain.js";
import { parseList } from "./utils/csv.js";
import { ConfigError } from "./utils/errors.js";
import { OUTPUT_FORMATS, parseFieldList, renderOutput } from "./utils/output.js";

export type CliContext = {
  stdout: LogSink;
  stderr: LogSink;
  env?: Record<string, string | undefined>;
  cwd?: string;
  home?: string;
  createClient?: (connection: Connection) => ApiClient;
  openHistory?: (filePath: string) => Db;
};

const GlobalOptionsSchema = z.object({
  profile: z.string().optional(),
  config: z.string().optional(),
  url: z.string().optional(),
  email: z.string().optional(),
  password: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  historyFile: z.string().optional(),
  output: z.enum(OUTPUT_FORMATS).optional(),
  fields: z.string().optional(),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  logFormat: z.enum(LOG_FORMATS).default("text"),
});

const SuiteOptionsSchema = z.object({
  projectId: z.number(),
  suiteId: z.number().optional(),
  suiteName: z.string().optional(),
});

const ImportCommandSchema = SuiteOptionsSchema.extend({
  dryRun: z.boolean().default(false),
  strict: z.boolean().default(false),
  mapping: z.string().optional(),
  templateId: z.number().optional(),
  stepsField: z.enum(STEPS_FIELDS).optional(),
  createMissingSections: z.boolean().default(false),
  sectionPath: z.string().optional(),
  history: z.boolean().default(true),
});

const ExportCommandSchema = SuiteOptionsSchema.extend({
  caseIds: z.array(z.number()).optional(),
  sectionId: z.number().optional(),
  priorityId: z.array(z.number()).optional(),
  typeId: z.array(z.number()).optional(),
  mapping: z.string().optional(),
  csv: z.string().optional(),
});

function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, values: unknown): T {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid option ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return Number(value);
}

function parseIdList(value: string): number[] {
  const ids = parseList(value).map((item) => item.replace(/^[Cc](?=\d)/, ""));
  if (!ids.length || ids.some((id) => !/^\d+$/.test(id))) {
    throw new InvalidArgumentError("expected a comma-separated list of integers");
  }
  return ids.map(Number);
}

function parseMethod(value: string): HttpMethod {
  const method = value.toUpperCase();
  if (method === "GET" || method === "POST" || method === "DELETE") return method;
  throw new InvalidArgumentError("expected GET, POST or DELETE");
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseParams(pairs: string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf("=");
    if (index <= 0) {
      throw new ConfigError(`Invalid --param '${pair}': expected key=value`);
    }
    params[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return params;
}

function parseJsonObject(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ConfigError("--data must be valid JSON");
  }
  const parsed = z.record(z.unknown()).safeParse(value);
  if (!parsed.success) {
    throw new ConfigError("--data must be a JSON object");
  }
  return parsed.data;
}

export function createProgram(context: CliContext, state: { exitCode: number }): Command {
  const cwd = context.cwd ?? process.cwd();
  const home = context.home ?? os.homedir();
  const createClient = context.createClient ?? createApiClient;
  const openHistory = context.openHistory ?? openDatabase;

  type Session = {
    logger: Logger;
    settings: Settings;
    client: () => ApiClient;
    print: (value: unknown) => void;
    output?: "json" | "table" | "raw";
  };

  const session = async (command: Command): Promise<Session> => {
    const globals = parseOptions(GlobalOptionsSchema, command.optsWithGlobals());
    const logger = createLogger({
      level: globals.quiet ? "silent" : globals.verbose ? "debug" : "info",
      format: globals.logFormat,
      output: context.stderr,
    });
    const settings = await resolveSettings({
      configPath: globals.config,
      profile: globals.profile,
      overrides: {
        url: globals.url,
        email: globals.email,
        password: globals.password,
        timeout: globals.timeout,
        historyFile: globals.historyFile,
      },
      env: context.env ?? process.env,
      locations: { cwd, home },
      logger,
    });
    const fields = parseFieldList(globals.fields);

    return {
      logger,
      settings,
      output: globals.output,
      client: () => createClient(requireConnection(settings)),
      print: (value) => {
        context.stdout.write(renderOutput(value, globals.output ?? "json", fields));
      },
    };
  };

  const withHistory = <T>(settings: Settings, work: (db: Db) => T): T => {
    const db = openHistory(settings.historyFile);
    try {
      runMigrations(db);
      return work(db);
    } finally {
      db.close();
    }
  };

  const program = new Command();
  program
    .name("caseport")
    .description("Test case import/export and REST access for a TestRail server.")
    .version("0.1.0")
    .option("--profile <name>", "config profile to use")
    .option("--config <file>", `config file (default: ./${CONFIG_FILE_NAME}, then ~/${CONFIG_FILE_NAME})`)
    .option("--url <url>", "server URL")
    .option("--email <email>", "account email")
    .option("--password <password>", "password or API key")
    .option("--timeout <seconds>", "request timeout in seconds", parseInteger)
    .option("--history-file <file>", "SQLite file for the import history")
    .option("-o, --output <format>", `output format (${OUTPUT_FORMATS.join("|")})`)
    .option("--fields <list>", "comma-separated fields to keep in the output")
    .option("-v, --verbose", "debug logging", false)
    .option("-q, --quiet", "only log errors", false)
    .option("--log-format <format>", `log format (${LOG_FORMATS.join("|")})`, "text")
    .configureOutput({
      writeOut: (text) => {
        context.stdout.write(text);
      },
      writeErr: (text) => {
        context.stderr.write(text);
      },
    })
    .exitOverride();

  const config = program.command("config").description("manage connection profiles");

  config
    .command("init")
    .description("write a profile to the config file")
    .option("--file <file>", "config file to write", path.join(home, CONFIG_FILE_NAME))
    .action(async (options: { file: string }, command: Command) => {
      const globals = parseOptions(GlobalOptionsSchema, command.optsWithGlobals());
      const { settings } = await session(command);
      const connection = requireConnection(settings);
      const profileName = globals.profile ?? settings.profile;
      const filePath = path.resolve(cwd, options.file);
      await initConfig(filePath, profileName, {
        url: connection.url,
        email: connection.email,
        password: connection.password,
        ...(globals.timeout !== undefined ? { timeout: globals.timeout } : {}),
        ...(globals.historyFile !== undefined ? { historyFile: globals.historyFile } : {}),
      });
      context.stdout.write(`Saved profile '${profileName}' to ${filePath}\n`);
    });

  config
    .command("show")
    .description("print the resolved settings (password hidden)")
    .action(async (_options: unknown, command: Command) => {
      const { settings, print } = await session(command);
      print(redactSettings(settings));
    });

  program
    .command("projects")
    .description("list projects")
    .command("list")
    .action(async (_options: unknown, command: Command) => {
      const { client, print } = await session(command);
      print(await client().listProjects());
    });

  program
    .command("suites")
    .description("list suites")
    .command("list")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .action(async (_options: unknown, command: Command) => {
      const { client, print } = await session(command);
      const { projectId } = parseOptions(SuiteOptionsSchema, command.opts());
      print(await client().listSuites(projectId));
    });

  const sections = program.command("sections").description("list and add sections");

  sections
    .command("list")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .option("--suite-id <id>", "suite id", parseInteger)
    .option("--suite-name <name>", "suite name")
    .action(async (_options: unknown, command: Command) => {
      const { client, print } = await session(command);
      const options = parseOptions(SuiteOptionsSchema, command.opts());
      const api = client();
      const suiteId =
        options.suiteId !== undefined || options.suiteName !== undefined
          ? await resolveSuite(api, options.projectId, options)
          : null;
      const list = await api.listSections(options.projectId, suiteId);
      const paths = buildSectionPaths(list);
      print(list.map((section) => ({ ...section, path: paths.get(section.id) ?? section.name })));
    });

  sections
    .command("add")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .requiredOption("--name <name>", "section name")
    .option("--suite-id <id>", "suite id", parseInteger)
    .option("--parent-id <id>", "parent section id", parseInteger)
    .option("--description <text>", "section description")
    .action(
      async (
        options: { projectId: number; name: string; suiteId?: number; parentId?: number; description?: string },
        command: Command,
      ) => {
        const { client, print } = await session(command);
        print(
          await client().addSection(options.projectId, {
            name: options.name,
            suiteId: options.suiteId ?? null,
            parentId: options.parentId ?? null,
            description: options.description,
          }),
        );
      },
    );

  const cases = program.command("cases").description("list, fetch, import and export test cases");

  cases
    .command("list")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .option("--suite-id <id>", "suite id", parseInteger)
    .option("--suite-name <name>", "suite name")
    .option("--section-id <id>", "section id", parseInteger)
    .option("--priority-id <ids>", "comma-separated priority ids", parseIdList)
    .option("--type-id <ids>", "comma-separated type ids", parseIdList)
    .action(async (_options: unknown, command: Command) => {
      const { client, print } = await session(command);
      const options = parseOptions(ExportCommandSchema, command.opts());
      const api = client();
      const suiteId = await resolveSuite(api, options.projectId, options);
      print(
        await api.listCases({
          projectId: options.projectId,
          suiteId,
          sectionId: options.sectionId,
          priorityIds: options.priorityId,
          typeIds: options.typeId,
        }),
      );
    });

  cases
    .command("get")
    .argument("<caseId>", "case id (C123 or 123)", (value: string) => parseInteger(value.replace(/^[Cc](?=\d)/, "")))
    .action(async (caseId: number, _options: unknown, command: Command) => {
      const { client, print } = await session(command);
      print(await client().getCase(caseId));
    });

  cases
    .command("import")
    .description("create and update cases from a CSV file")
    .argument("<file>", "CSV file")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .option("--suite-id <id>", "suite id", parseInteger)
    .option("--suite-name <name>", "suite name")
    .option("--section-path <path>", "section for new cases whose rows have none")
    .option("--template-id <id>", "template id for every case", parseInteger)
    .option("--steps-field <field>", `steps field (${STEPS_FIELDS.join("|")})`)
    .option("--mapping <file>", "YAML or JSON field mapping")
    .option("--create-missing-sections", "create sections that do not exist", false)
    .option("--strict", "abort before any change when a case group is invalid", false)
    .option("--dry-run", "print the planned action per case without calling the server", false)
    .option("--no-history", "do not record this run in the import history")
    .action(async (file: string, _options: unknown, command: Command) => {
      const { client, logger, settings, print, output } = await session(command);
      const options = parseOptions(ImportCommandSchema, command.opts());
      const filePath = path.resolve(cwd, file);
      const csvText = await readFile(filePath, "utf8");
      const mapping = options.mapping ? await loadFieldMapping(path.resolve(cwd, options.mapping)) : createFieldMapping();

      const importOptions = {
        projectId: options.projectId,
        suiteId: options.suiteId,
        suiteName: options.suiteName,
        defaultSection: options.sectionPath,
        templateId: options.templateId,
        stepsField: options.stepsField,
        createMissingSections: options.createMissingSections,
        mapping,
        strict: options.strict,
      };

      if (options.dryRun) {
        print(previewImport(csvText, importOptions));
        return;
      }

      const summary = await importCases(client(), csvText, importOptions, logger);

      if (options.history) {
        const logId = withHistory(settings, (db) =>
          saveImportLog(db, {
            fileName: path.basename(filePath),
            projectId: options.projectId,
            suiteId: summary.suiteId,
            summary,
          }),
        );
        logger.info("import recorded in history", { logId });
      }

      if (output) {
        print(summary);
      } else {
        context.stdout.write(formatImportSummary(summary));
      }
      if (summary.failed > 0) state.exitCode = 1;
    });

  cases
    .command("export")
    .description("write cases as CSV")
    .requiredOption("--project-id <id>", "project id", parseInteger)
    .option("--suite-id <id>", "suite id", parseInteger)
    .option("--suite-name <name>", "suite name")
    .option("--case-ids <ids>", "comma-separated case ids", parseIdList)
    .option("--section-id <id>", "section id", parseInteger)
    .option("--priority-id <ids>", "comma-separated priority ids", parseIdList)
    .option("--type-id <ids>", "comma-separated type ids", parseIdList)
    .option("--mapping <file>", "YAML or JSON field mapping")
    .option("--csv <file>", "write to this file instead of stdout")
    .action(async (_options: unknown, command: Command) => {
      const { client, logger } = await session(command);
      const options = parseOptions(ExportCommandSchema, command.opts());
      const mapping = options.mapping ? await loadFieldMapping(path.resolve(cwd, options.mapping)) : createFieldMapping();

      const result = await exportCases(
        client(),
        {
          projectId: options.projectId,
          suiteId: options.suiteId,
          suiteName: options.suiteName,
          caseIds: options.caseIds,
          sectionId: options.sectionId,
          priorityIds: options.priorityId,
          typeIds: options.typeId,
          mapping,
        },
        logger,
      );

      if (!options.csv) {
        context.stdout.write(result.csvText);
        return;
      }
      const target = path.resolve(cwd, options.csv);
      await writeFile(target, result.csvText, "utf8");
      context.stdout.write(`Exported ${result.caseCount} cases (${result.rowCount} rows) to ${target}\n`);
    });

  program
    .command("raw")
    .description("call any API endpoint")
    .argument("<method>", "GET, POST or DELETE", parseMethod)
    .argument("<endpoint>", "endpoint, e.g. get_case/1")
    .option("--param <key=value>", "query parameter (repeatable)", collect, [])
    .option("--data <json>", "JSON request body")
    .action(async (method: HttpMethod, endpoint: string, options: { param: string[]; data?: string }, command: Command) => {
      const { client, print } = await session(command);
      print(
        await client().call(endpoint, method, {
          params: parseParams(options.param),
          data: parseJsonObject(options.data),
        }),
      );
    });

  const history = program.command("history").description("inspect recorded import runs");

  history
    .command("list")
    .action(async (_options: unknown, command: Command) => {
      const { settings, print } = await session(command);
      print(withHistory(settings, (db) => listImportLogs(db)));
    });

  history
    .command("show")
    .argument("<id>", "import log id", parseInteger)
    .action(async (id: number, _options: unknown, command: Command) => {
      const { settings, print } = await session(command);
      const entry = withHistory(settings, (db) => {
        const log = getImportLog(db, id);
        return log ? { ...log, rows: listImportLogRows(db, id) } : null;
      });
      if (!entry) throw new ConfigError(`Import log not found: ${id}`);
      print(entry);
    });

  history
    .command("delete")
    .argument("<id>", "import log id", parseInteger)
    .action(async (id: number, _options: unknown, command: Command) => {
      const { settings } = await session(command);
      if (!withHistory(settings, (db) => deleteImportLog(db, id))) {
        throw new ConfigError(`Import log not found: ${id}`);
      }
      context.stdout.write(`Deleted import log ${id}\n`);
    });

  history
    .command("clear")
    .action(async (_options: unknown, command: Command) => {
      const { settings } = await session(command);
      const removed = withHistory(settings, (db) => clearImportLogs(db));
      context.stdout.write(`Deleted ${removed} import logs\n`);
    });

  return program;
}

/** Parses `argv` (including the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(context, state);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written its message
      return error.code === "commander.helpDisplayed" || error.code === "commander.version" ? 0 : error.exitCode || 1;
    }
    context.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  return state.exitCode;
}
