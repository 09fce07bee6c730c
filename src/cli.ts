import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { ApplicationSchema, formatIssues } from "./modules/application.schema";
import { underwriteApplication, underwriteBatch } from "./modules/quote.service";
import { loadEnv } from "./config/env";
import { createOpenAIRiskAssessor, type RiskAssessor } from "./services/riskAssessor";
import { openDocumentStore } from "./services/documentStore";
import { titleCase } from "./modules/format";

export const USAGE = `Usage:
  uw-quote quote --business-name <name> --business-type <type> --annual-revenue <usd>
                 --employee-count <n> --state <code> --city <city>
                 --years-in-business <n> --business-description <text>
                 [--additional-notes <text>] [--claims <claims.json>] [--output <file>]
  uw-quote batch-quote <requests.json> [--output-dir <dir>]
  uw-quote guidelines <business-type> [--docs-dir <dir>]

Options:
  --reports-dir <dir>   Where PDF reports are written (default: REPORTS_DIR or ./reports)
  --docs-dir <dir>      Guideline documents (default: GUIDELINES_DIR or ./data/guidelines)
  -h, --help            Show this message`;

// ── CLI arg parsing ─────────────────────────────────────────────────────────

export interface CliArgs {
  command: string | undefined;
  positionals: string[];
  options: Record<string, string>;
  help: boolean;
}

const SHORT_FLAGS = new Map([
  ["-o", "output"],
  ["-h", "help"]
]);

// Anything else that starts with "-" is a value, e.g. "-fried menu" or "-5".
function toFlag(arg: string) {
  return SHORT_FLAGS.get(arg) ?? (arg.startsWith("--") ? arg.slice(2) : undefined);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const flag = toFlag(arg);

    if (flag === undefined) {
      positionals.push(arg);
      continue;
    }

    const eq = flag.indexOf("=");
    if (eq >= 0) {
      options[flag.slice(0, eq)] = flag.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (flag !== "help" && next !== undefined && toFlag(next) === undefined) {
      options[flag] = next;
      i++;
    } else {
      options[flag] = "true";
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, options, help: options.help === "true" };
}

function toNumber(value: string | undefined) {
  return value === undefined || value.trim() === "" ? undefined : Number(value);
}

export function applicationFromOptions(options: Record<string, string>, claimsHistory: unknown) {
  return {
    businessName: options["business-name"],
    businessType: options["business-type"],
    annualRevenue: toNumber(options["annual-revenue"]),
    employeeCount: toNumber(options["employee-count"]),
    state: options.state,
    city: options.city,
    yearsInBusiness: toNumber(options["years-in-business"]),
    businessDescription: options["business-description"],
    additionalNotes: options["additional-notes"],
    claimsHistory
  };
}

export function quoteFileName(businessName: string, position: number) {
  const slug = businessName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `quote_${slug || "business"}_${position}.json`;
}

async function loadJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch {
    throw new Error(`File not found: ${filePath}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

async function saveJsonFile(filePath: string, data: unknown) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

// ── Commands ────────────────────────────────────────────────────────────────

export interface CliDeps {
  /** Built lazily so --help and argument errors need no API key. */
  createAssessor: () => RiskAssessor;
  reportsDir: string;
  guidelinesDir: string;
  asOf?: Date;
}

async function quoteCommand(args: CliArgs, deps: CliDeps) {
  let claims: unknown = [];
  if (args.options.claims) {
    claims = await loadJsonFile(args.options.claims);
    if (!Array.isArray(claims)) {
      throw new Error("Claims file must contain a list of claims");
    }
  }

  const parsed = ApplicationSchema.safeParse(applicationFromOptions(args.options, claims));
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }

  const decision = await underwriteApplication(parsed.data, {
    assessor: deps.createAssessor(),
    reportsDir: deps.reportsDir,
    asOf: deps.asOf
  });

  if (args.options.output) {
    await saveJsonFile(args.options.output, decision);
    console.log(`Quote saved to ${args.options.output}`);
  } else {
    console.log(JSON.stringify(decision, null, 2));
  }

  return 0;
}

async function batchQuoteCommand(args: CliArgs, deps: CliDeps) {
  const [inputFile] = args.positionals;
  if (!inputFile) {
    throw new Error("batch-quote requires an input file");
  }

  const entries = await loadJsonFile(inputFile);
  if (!Array.isArray(entries)) {
    throw new Error("Input file must contain a list of policy requests");
  }

  const outputDir = args.options["output-dir"] ?? args.options.output;
  const results = await underwriteBatch(entries, {
    assessor: deps.createAssessor(),
    reportsDir: deps.reportsDir,
    asOf: deps.asOf
  });

  let failures = 0;
  for (const result of results) {
    const position = result.index + 1;

    if (!result.ok) {
      failures++;
      console.error(`Error processing request ${position}: ${result.error}`);
      continue;
    }

    if (outputDir) {
      const outputFile = path.join(outputDir, quoteFileName(result.decision.businessName, position));
      await saveJsonFile(outputFile, result.decision);
      console.log(`Quote ${position} saved to ${outputFile}`);
    } else {
      console.log(`\nQuote ${position} for ${result.decision.businessName}:`);
      console.log(JSON.stringify(result.decision, null, 2));
    }
  }

  console.log(`Processed ${results.length} requests (${failures} failed)`);
  return failures > 0 ? 1 : 0;
}

function formatMetadataValue(value: unknown) {
  return typeof value === "string" ? value : JSON.stringify(value);
}

async function guidelinesCommand(args: CliArgs, deps: CliDeps) {
  const [businessType] = args.positionals;
  if (!businessType) {
    throw new Error("guidelines requires a business type");
  }

  const store = await openDocumentStore(deps.guidelinesDir);
  const guidelines = store.guidelinesFor(businessType);

  if (guidelines.length === 0) {
    console.log(`No guidelines found for ${businessType}`);
    return 0;
  }

  console.log(`Underwriting Guidelines for ${titleCase(businessType)} Businesses:`);
  console.log("=".repeat(50));
  for (const guideline of guidelines) {
    console.log(`\n${guideline.title}`);
    console.log("-".repeat(30));
    console.log(guideline.content);

    const entries = Object.entries(guideline.metadata);
    if (entries.length > 0) {
      console.log("\nMetadata:");
      for (const [key, value] of entries) {
        console.log(`  ${key}: ${formatMetadataValue(value)}`);
      }
    }
  }

  return 0;
}

export async function runCli(argv: string[], deps?: Partial<CliDeps>): Promise<number> {
  const args = parseCliArgs(argv);

  if (args.help || !args.command) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  const resolved: CliDeps = {
    createAssessor:
      deps?.createAssessor ??
      (() => {
        const env = loadEnv();
        return createOpenAIRiskAssessor({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL });
      }),
    reportsDir: args.options["reports-dir"] ?? deps?.reportsDir ?? process.env.REPORTS_DIR ?? "reports",
    guidelinesDir:
      args.options["docs-dir"] ?? deps?.guidelinesDir ?? process.env.GUIDELINES_DIR ?? "data/guidelines",
    asOf: deps?.asOf
  };

  try {
    switch (args.command) {
      case "quote":
        return await quoteCommand(args, resolved);
      case "batch-quote":
        return await batchQuoteCommand(args, resolved);
      case "guidelines":
        return await guidelinesCommand(args, resolved);
      default:
        console.error(`Unknown command: ${args.command}\n\n${USAGE}`);
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
