/**
 * @fileoverview Command-line options
 *
 * @module cli/options
 */

export const kUSAGE =
    "usage: comment-learner [-d] [-m minEntities] [-e minEntropy] [-k labelAttr] " +
    "[-s featureSet] [-f tree.json] [-o out.json] file...";

/**
 * Parsed command line
 */
export interface CliOptions {
    /** Log the build trace and the tree dump */
    debug: boolean;

    /** Minimum entities per node; overrides the environment */
    minEntities?: number;

    /** Minimum entropy per node; overrides the environment */
    minEntropy?: number;

    /** Attribute holding the label */
    labelAttribute: string;

    /** Feature set name from features.yml */
    featureSet: string;

    /** Tree to score against; training runs when absent */
    treeFile?: string;

    /** Where to write the trained tree; stdout when absent */
    outFile?: string;

    /** Input .feats files */
    files: string[];
}

/**
 * Raised for a command line that cannot be parsed. The message is shown
 * with the usage line.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

const kVALUE_FLAGS = new Set(["-m", "-e", "-k", "-s", "-f", "-o"]);

/**
 * Parse arguments (without the node and script entries).
 *
 * Value flags take the next argument or an attached value (`-m5`). `--`
 * ends option parsing.
 *
 * @throws UsageError on an unknown flag, a missing or malformed value, or no input files
 */
export function parseCliOptions(args: readonly string[]): CliOptions {
    const options: CliOptions = {
        debug         : false,
        labelAttribute: "key",
        featureSet    : "cat",
        files         : [],
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === "--") {
            options.files.push(...args.slice(i + 1));
            break;
        }
        if (!arg.startsWith("-")) {
            options.files.push(arg);
            continue;
        }
        if (arg === "-d") {
            options.debug = true;
            continue;
        }

        const flag = arg.slice(0, 2);
        if (!kVALUE_FLAGS.has(flag)) {
            throw new UsageError(`Unknown option: ${arg}`);
        }

        let value = arg.slice(2);
        if (value === "") {
            if (i + 1 >= args.length) {
                throw new UsageError(`Option ${flag} requires a value`);
            }
            value = args[++i];
        }

        switch (flag) {
            case "-m":
                options.minEntities = parseNumber(flag, value, true);
                break;
            case "-e":
                options.minEntropy = parseNumber(flag, value, false);
                break;
            case "-k":
                options.labelAttribute = value;
                break;
            case "-s":
                options.featureSet = value;
                break;
            case "-f":
                options.treeFile = value;
                break;
            case "-o":
                options.outFile = value;
                break;
        }
    }

    if (options.files.length === 0) {
        throw new UsageError("No input files");
    }

    return options;
}

function parseNumber(flag: string, value: string, integer: boolean): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0 || (integer && !Number.isInteger(parsed))) {
        throw new UsageError(`Option ${flag} expects a non-negative ${integer ? "integer" : "number"}, got '${value}'`);
    }
    return parsed;
}
