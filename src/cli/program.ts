import { Command, CommanderError } from "commander";
import { z } from "zod";
import { renderResourceTable, renderTimings } from "./format.js";
import { resolveAuthContext } from "../auth/resolveAuth.js";
import { SessionManager } from "../auth/sessionManager.js";
import { ComputeClient } from "../compute/client.js";
import type { ResourceType } from "../compute/resources.js";
import { loadConfig } from "../config/loadConfig.js";
import { ComputeClientError, asErrorResponse } from "../errors.js";
import type { LogFn, QueryParams, RequestTiming } from "../types.js";

export const CLI_NAME = "computectl";
export const CLI_VERSION = "0.1.0";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Shared across commands of one run; tests inject one with a fixed clock. */
  sessions?: SessionManager;
}

interface ListCommandDef {
  name: string;
  type: ResourceType;
  description: string;
}

const LIST_COMMANDS: readonly ListCommandDef[] = [
  { name: "list", type: "servers", description: "List servers." },
  {
    name: "flavor-list",
    type: "flavors",
    description: "Print a list of available 'flavors' (sizes of servers).",
  },
  {
    name: "keypair-list",
    type: "keypairs",
    description: "Print a list of keypairs for a user.",
  },
  {
    name: "image-list",
    type: "images",
    description: "Print a list of available images to boot from.",
  },
  {
    name: "network-list",
    type: "networks",
    description: "Print a list of available networks.",
  },
  {
    name: "secgroup-list",
    type: "security-groups",
    description: "List security groups for the current tenant.",
  },
  {
    name: "hypervisor-list",
    type: "hypervisors",
    description: "List hypervisors.",
  },
];

const optionsSchema = z.object({
  osUsername: z.string().optional(),
  osPassword: z.string().optional(),
  osTenantName: z.string().optional(),
  osAuthUrl: z.string().optional(),
  osComputeApiVersion: z.string().optional(),
  osRegionName: z.string().optional(),
  osEndpointType: z.string().optional(),
  serviceType: z.string().optional(),
  serviceName: z.string().optional(),
  bypassUrl: z.string().optional(),
  osToken: z.string().optional(),
  osAuthToken: z.string().optional(),
  timeout: z.coerce
    .number()
    .min(0.001, "must be at least 0.001 seconds")
    .optional(),
  config: z.string().optional(),
  debug: z.boolean().optional(),
  timings: z.boolean().optional(),
  limit: z.coerce.number().int().min(-1).optional(),
  marker: z.string().optional(),
  json: z.boolean().optional(),
});

type CliOptions = z.infer<typeof optionsSchema>;

interface RunDeps {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  sessions?: SessionManager;
}

function writeTo(stream: NodeJS.WriteStream): (text: string) => void {
  return (text) => {
    stream.write(text);
  };
}

function parseOptions(raw: unknown): CliOptions {
  const parsed = optionsSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const path = issue.path.length ? issue.path.join(".") : "options";
  throw new ComputeClientError("CONFIG_ERROR", `${path}: ${issue.message}`, {
    issues: parsed.error.issues.map((item) => ({
      path: item.path,
      message: item.message,
    })),
  });
}

export function buildProgram(deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? writeTo(process.stdout);
  const stderr = deps.stderr ?? writeTo(process.stderr);

  const program = new Command();
  program
    .name(CLI_NAME)
    .description("Command-line interface to a cloud compute API.")
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr })
    .option("--os-username <auth-user-name>", "Defaults to env[OS_USERNAME].")
    .option("--os-password <auth-password>", "Defaults to env[OS_PASSWORD].")
    .option(
      "--os-tenant-name <auth-tenant-name>",
      "Defaults to env[OS_TENANT_NAME], then env[OS_PROJECT_NAME].",
    )
    .option("--os-auth-url <auth-url>", "Defaults to env[OS_AUTH_URL].")
    .option(
      "--os-compute-api-version <compute-api-ver>",
      "Accepts X or X.Y. Defaults to env[OS_COMPUTE_API_VERSION], then 2.1.",
    )
    .option(
      "--os-region-name <region-name>",
      "Defaults to env[OS_REGION_NAME].",
    )
    .option(
      "--os-endpoint-type <endpoint-type>",
      "public, internal or admin. Defaults to env[OS_ENDPOINT_TYPE], then public.",
    )
    .option("--service-type <service-type>", "Defaults to compute.")
    .option(
      "--service-name <service-name>",
      "Defaults to env[NOVA_SERVICE_NAME].",
    )
    .option(
      "--bypass-url <bypass-url>",
      "Use this API endpoint instead of the service catalog. " +
        "Defaults to env[NOVACLIENT_BYPASS_URL].",
    )
    .option(
      "--os-token <auth-token>",
      "Pre-issued token, used with --bypass-url. Defaults to env[OS_TOKEN].",
    )
    .option("--os-auth-token <auth-token>", "Deprecated alias of --os-token.")
    .option("--timeout <seconds>", "Set HTTP call timeout (in seconds).")
    .option("--config <path>", "YAML file with default settings.")
    .option("--debug", "Print HTTP requests and responses on stderr.")
    .option("--timings", "Print call timing info.");

  for (const def of LIST_COMMANDS) {
    program
      .command(def.name)
      .description(def.description)
      .option(
        "--limit <limit>",
        "Maximum number of items to display; -1 for all.",
      )
      .option(
        "--marker <marker>",
        "Last ID of the previous page; list items after it.",
      )
      .option("--json", "Output as JSON.")
      .action(async (_options: unknown, command: Command) => {
        const options = parseOptions(command.optsWithGlobals());
        await runListCommand(def.type, options, {
          env,
          stdout,
          stderr,
          sessions: deps.sessions,
        });
      });
  }

  return program;
}

async function runListCommand(
  type: ResourceType,
  options: CliOptions,
  deps: RunDeps,
): Promise<void> {
  const log: LogFn | undefined = options.debug
    ? (line) => deps.stderr(`[${CLI_NAME}] ${line}\n`)
    : undefined;

  const fileConfig = options.config
    ? await loadConfig(options.config)
    : undefined;
  const context = resolveAuthContext(
    {
      authUrl: options.osAuthUrl,
      username: options.osUsername,
      password: options.osPassword,
      tenantName: options.osTenantName,
      regionName: options.osRegionName,
      computeApiVersion: options.osComputeApiVersion,
      endpointType: options.osEndpointType,
      serviceType: options.serviceType,
      serviceName: options.serviceName,
      bypassUrl: options.bypassUrl,
      authToken: options.osToken ?? options.osAuthToken,
    },
    { env: deps.env, defaults: fileConfig },
  );

  const timeoutMs =
    options.timeout !== undefined
      ? Math.round(options.timeout * 1000)
      : fileConfig?.timeoutMs;
  const timings: RequestTiming[] = [];
  const onTiming = options.timings
    ? (timing: RequestTiming) => {
        timings.push(timing);
      }
    : undefined;
  const client = new ComputeClient({
    context,
    sessions:
      deps.sessions ?? new SessionManager({ timeoutMs, log, onTiming }),
    timeoutMs,
    log,
    onTiming,
  });

  const limit =
    options.limit !== undefined && options.limit >= 0
      ? options.limit
      : undefined;
  const query: QueryParams = {
    marker: options.marker,
    limit,
  };

  log?.(`listing ${type} from ${context.authUrl}`);
  const items = await client.list(type, query).toArray(limit);

  if (options.json) {
    deps.stdout(`${JSON.stringify(items, null, 2)}\n`);
  } else {
    deps.stdout(renderResourceTable(type, items));
  }

  if (options.timings) {
    // keep --json output parseable
    (options.json ? deps.stderr : deps.stdout)(renderTimings(timings));
  }
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(
  argv: string[],
  deps: CliDeps = {},
): Promise<number> {
  const stderr = deps.stderr ?? writeTo(process.stderr);
  const program = buildProgram({ ...deps, stderr });

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    if (error instanceof ComputeClientError) {
      stderr(`${JSON.stringify(asErrorResponse(error), null, 2)}\n`);
      return 1;
    }

    if (error instanceof Error) {
      stderr(`${error.stack ?? error.message}\n`);
    } else {
      stderr(`${String(error)}\n`);
    }
    return 1;
  }
}
