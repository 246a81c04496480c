import { parseArgs } from "node:util";
import { resolve } from "node:path";
import { RuleProject, initProject } from "./project.js";
import type { RuleDocument } from "./document/types.js";
import { describeError } from "./errors.js";
import { createLogger, setLogLevel } from "./util/logger.js";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

const USAGE = `
ruleshare - Pull shared editor/assistant rules into a project and resolve them per file

Usage:
  ruleshare init <url>        Create .ruleshare.yaml pointing at a rules remote
  ruleshare sync              Pull the remote into the shared rules directory
  ruleshare list [path]       List effective rules (only those applying to path, if given)
  ruleshare resolve <path>    Print the rule bodies applying to path, in load order
  ruleshare check             Report malformed rules and exclusive-category conflicts
  ruleshare status            Show the sync state

Options:
  --config, -c       Path to the config file (default: .ruleshare.yaml)
  --cwd              Project root (default: current directory)
  --json             Machine-readable output
  --kind             init: remote kind, git or directory (default: git)
  --ref              init: branch or tag to pull
  --path             init: sub-directory of the remote holding the rules
  --force            init: overwrite an existing config
  --verbose, -v      Enable debug logging
  --help, -h         Show this help
`;

const PROJECT_COMMANDS = ["sync", "list", "resolve", "check", "status"] as const;
type ProjectCommand = (typeof PROJECT_COMMANDS)[number];

function isProjectCommand(command: string): command is ProjectCommand {
  return PROJECT_COMMANDS.some((c) => c === command);
}

interface CliOptions {
  cwd: string;
  config?: string;
  json: boolean;
}

function describeScope(doc: RuleDocument): string {
  if (doc.scope.alwaysApply) return "always";
  if (doc.scope.globs.length === 0) return "manual";
  return doc.scope.globs.join(",");
}

function print(opts: CliOptions, value: unknown, text: () => string): void {
  console.log(opts.json ? JSON.stringify(value, null, 2) : text());
}

async function cmdInit(
  positionals: string[],
  values: { kind?: string; ref?: string; path?: string; force?: boolean },
  opts: CliOptions,
): Promise<number> {
  const url = positionals[0];
  if (!url) {
    console.error("init needs the remote url or directory");
    return EXIT_USAGE;
  }
  const kind = values.kind ?? "git";
  if (kind !== "git" && kind !== "directory") {
    console.error(`Unknown remote kind: ${kind}`);
    return EXIT_USAGE;
  }
  const configPath = await initProject(opts.cwd, {
    remote: { kind, url, ref: values.ref, path: values.path },
    force: values.force,
  });
  console.log(`Created ${configPath}`);
  return EXIT_OK;
}

async function cmdSync(project: RuleProject, opts: CliOptions): Promise<number> {
  const summary = await project.sync();
  for (const warning of summary.warnings) {
    console.error(`warning: ${describeError(warning)}`);
  }
  print(
    opts,
    { ...summary, warnings: summary.warnings.map((w) => ({ kind: w.kind, identifiers: w.identifiers })) },
    () =>
      `Synced ${summary.revision}: ${summary.added.length} added, ${summary.updated.length} updated, ` +
      `${summary.removed.length} removed, ${summary.unchanged.length} unchanged`,
  );
  return EXIT_OK;
}

async function cmdList(project: RuleProject, path: string | undefined, opts: CliOptions): Promise<number> {
  const docs = await project.list(path);
  print(
    opts,
    docs.map(({ body: _body, path: _path, ...rest }) => rest),
    () =>
      docs
        .map((d) => `${String(d.priority).padStart(5)}  ${d.source.padEnd(6)}  ${d.identifier}  (${describeScope(d)})`)
        .join("\n"),
  );
  return EXIT_OK;
}

async function cmdResolve(project: RuleProject, path: string | undefined, opts: CliOptions): Promise<number> {
  if (!path) {
    console.error("resolve needs a file path");
    return EXIT_USAGE;
  }
  const rules = await project.resolve(path);
  print(opts, rules, () => rules.map((r) => `==> ${r.identifier} <==\n${r.body}`).join("\n"));
  return EXIT_OK;
}

async function cmdCheck(project: RuleProject, opts: CliOptions): Promise<number> {
  const report = await project.load();
  const conflicts = report.malformed.length === 0 ? project.resolver.conflicts() : [];
  const problems = [
    ...report.malformed.map(describeError),
    ...conflicts.map(
      (c) =>
        `RuleConflictKind: "${c.documents[0].identifier}" and "${c.documents[1].identifier}" ` +
        `overlap in exclusive category "${c.category}"`,
    ),
  ];
  print(
    opts,
    {
      rules: report.shared.length + report.local.length,
      malformed: report.malformed.map((e) => ({ kind: e.kind, identifiers: e.identifiers, message: e.message })),
      conflicts: conflicts.map((c) => ({ category: c.category, identifiers: c.documents.map((d) => d.identifier) })),
    },
    () => (problems.length > 0 ? problems.join("\n") : `OK: ${report.shared.length + report.local.length} rules`),
  );
  return problems.length > 0 ? EXIT_ERROR : EXIT_OK;
}

async function cmdStatus(project: RuleProject, opts: CliOptions): Promise<number> {
  const state = await project.state();
  print(opts, state, () =>
    [
      `remote:    ${state.remote.url}${state.remote.ref ? `#${state.remote.ref}` : ""} (${state.remote.kind})`,
      `status:    ${state.status}`,
      `revision:  ${state.lastSyncedRevision ?? "-"}`,
      `synced at: ${state.lastSyncedAt ?? "-"}`,
      ...(state.lastError ? [`error:     ${state.lastError}`] : []),
    ].join("\n"),
  );
  return EXIT_OK;
}

export async function run(argv: string[]): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        cwd: { type: "string" },
        json: { type: "boolean", default: false },
        kind: { type: "string" },
        ref: { type: "string" },
        path: { type: "string" },
        force: { type: "boolean", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
    });
  } catch (e) {
    console.error(describeError(e));
    console.log(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (command !== "init" && !isProjectCommand(command)) {
    console.error(`Unknown command: ${command}`);
    console.log(USAGE);
    return EXIT_USAGE;
  }

  const opts: CliOptions = { cwd: resolve(values.cwd ?? process.cwd()), config: values.config, json: values.json };

  try {
    if (command === "init") {
      if (values.verbose) setLogLevel("debug");
      return await cmdInit(rest, values, opts);
    }

    const project = RuleProject.open(opts.cwd, opts.config);
    if (values.verbose) setLogLevel("debug");
    log.debug("Running command", { command, cwd: opts.cwd });

    switch (command) {
      case "sync":
        return await cmdSync(project, opts);
      case "list":
        return await cmdList(project, rest[0], opts);
      case "resolve":
        return await cmdResolve(project, rest[0], opts);
      case "check":
        return await cmdCheck(project, opts);
      case "status":
        return await cmdStatus(project, opts);
    }
  } catch (e) {
    console.error(describeError(e));
    return EXIT_ERROR;
  }
}
