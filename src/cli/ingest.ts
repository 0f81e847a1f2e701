import path from "node:path";
import { createServices } from "../app";
import { loadAppConfig } from "../config/loadConfig";
import { FileSystemObjectStorage } from "../ingest/objectStorage";
import { toStatusView, type SourceInput } from "../sources/types";
import { configureLogger, getLogger } from "../utils/logger";

interface CliOptions {
    configPath?: string;
    notebookId: string;
    input: SourceInput;
    title?: string;
    storageRoot?: string;
}

function printHelp(): void {
    const lines = [
        "Usage: notebook-rag-ingest --notebook <id> (--file <path> | --url <url> | --text <text>) [--title <title>]",
        "",
        "Options:",
        "  -c, --config     Path to an env file (defaults to RAG_CONFIG_PATH or .env).",
        "  -n, --notebook   Notebook that owns the new source.",
        "  -f, --file       PDF, HTML, Markdown or plain text file to ingest.",
        "  -u, --url        Web page or PDF to fetch and ingest.",
        "  -t, --text       Raw text to ingest.",
        "      --title      Title for the source (derived from the input otherwise).",
        "  -h, --help       Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function requireValue(argv: string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("-")) {
        throw new Error(`Missing value for ${flag}.`);
    }
    return value;
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let notebookId: string | undefined;
    let title: string | undefined;
    let storageRoot: string | undefined;
    const inputs: SourceInput[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                printHelp();
                process.exit(0);
            case "-c":
            case "--config":
                configPath = requireValue(argv, i, arg);
                i += 1;
                break;
            case "-n":
            case "--notebook":
                notebookId = requireValue(argv, i, arg);
                i += 1;
                break;
            case "-f":
            case "--file": {
                const filePath = path.resolve(process.cwd(), requireValue(argv, i, arg));
                storageRoot = path.dirname(filePath);
                inputs.push({ kind: "stored", key: path.basename(filePath), filename: path.basename(filePath) });
                i += 1;
                break;
            }
            case "-u":
            case "--url":
                inputs.push({ kind: "url", url: requireValue(argv, i, arg) });
                i += 1;
                break;
            case "-t":
            case "--text":
                inputs.push({ kind: "text", text: requireValue(argv, i, arg) });
                i += 1;
                break;
            case "--title":
                title = requireValue(argv, i, arg);
                i += 1;
                break;
            default:
                throw new Error(`Unknown argument "${arg}". Use --help for usage.`);
        }
    }

    if (!notebookId) {
        throw new Error("--notebook is required.");
    }

    const [input, ...rest] = inputs;
    if (!input || rest.length > 0) {
        throw new Error("Provide exactly one of --file, --url or --text.");
    }

    return { configPath, notebookId, input, title, storageRoot };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    const services = createServices(config, logger, {
        objectStorage: options.storageRoot ? new FileSystemObjectStorage(options.storageRoot) : undefined,
    });

    try {
        await services.repositories.verifyConnection();

        const source = await services.runner.submit(options.notebookId, options.input, { title: options.title });
        logger.info({ sourceId: source.id, title: source.title }, "Starting ingestion.");

        await services.runner.idle();

        const finished = await services.repositories.sources.get(source.id);
        if (!finished) {
            throw new Error(`Source ${source.id} disappeared during ingestion.`);
        }

        console.log(JSON.stringify(toStatusView(finished), null, 2));

        if (finished.status !== "completed") {
            process.exitCode = 1;
        }
    } finally {
        await services.close();
    }
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion failed.");
    process.exitCode = 1;
});
