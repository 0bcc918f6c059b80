/**
 * @fileoverview CLI runner
 *
 * Wires options, configuration, the file provider and the commands
 * together. Kept apart from the entry point so it can run under test.
 *
 * @module cli/run
 */

import { readFile, writeFile } from "fs/promises";
import {
    FeatureRegistry,
    collectEntities,
    createConsoleLogger,
    type EngineLogger,
    type LabeledEntity,
} from "@comment-tree/engine";
import { loadEnvSettings, loadFeatureSetsWithFallback, selectFeatureSet } from "../config/index.js";
import { FeatsFileEntityProvider, runEvaluation, runTraining } from "../domain/index.js";
import { kUSAGE, parseCliOptions, UsageError, type CliOptions } from "./options.js";

/**
 * Runtime dependencies of the CLI
 */
export interface CliDependencies {
    /** Path to features.yml */
    featuresPath: string;

    /** Environment variables (default: `process.env`) */
    env?: NodeJS.ProcessEnv;

    /** Receives each output line (default: `console.log`) */
    write?: (line: string) => void;

    /** Logger override; by default one is created from the log level */
    logger?: EngineLogger;
}

/**
 * Run the CLI.
 *
 * @param args - Arguments without the node and script entries
 * @returns Process exit status: 0 on success, 2 on a usage error
 * @throws Any error from reading input or loading a tree
 */
export async function runCli(args: readonly string[], deps: CliDependencies): Promise<number> {
    const write = deps.write ?? ((line: string) => console.log(line));

    let options: CliOptions;
    try {
        options = parseCliOptions(args);
    }
    catch (error) {
        if (error instanceof UsageError) {
            write(`${error.message}\n${kUSAGE}`);
            return 2;
        }
        throw error;
    }

    const env = loadEnvSettings(deps.env ?? process.env);
    const logger = deps.logger ?? createConsoleLogger({
        level : options.debug ? "debug" : env.logLevel,
        prefix: "comment-learner",
    });

    const featureSets = loadFeatureSetsWithFallback(deps.featuresPath, logger);
    const registry = FeatureRegistry.fromSpecs(selectFeatureSet(featureSets, options.featureSet));
    logger.info(`Using feature set '${options.featureSet}'`, { features: registry.size });

    const provider = new FeatsFileEntityProvider({
        files         : options.files,
        labelAttribute: options.labelAttribute,
        logger,
    });
    let entities: LabeledEntity[];
    try {
        entities = await collectEntities(provider);
    }
    finally {
        await provider.shutdown();
    }

    if (options.treeFile) {
        const treeText = await readFile(options.treeFile, "utf-8");
        const { lines } = runEvaluation({ registry, treeText, entities });
        lines.forEach((line) => write(line));
        return 0;
    }

    const { json } = runTraining({
        registry,
        entities,
        minEntities: options.minEntities ?? env.minEntities,
        minEntropy : options.minEntropy ?? env.minEntropy,
        logger,
    });

    if (options.outFile) {
        await writeFile(options.outFile, `${json}\n`, "utf-8");
        logger.info(`Wrote tree to ${options.outFile}`);
    }
    else {
        write(json);
    }
    return 0;
}
