/**
 * @fileoverview TreeCodec
 *
 * Converts trees to and from a plain nested structure:
 *
 * - Leaf   → the bare label string
 * - Branch → [featureName, arg, defaultLabel, [[branchValue, child], ...]]
 *
 * Shape is the only discriminant. Imports are checked against a zod schema
 * of this grammar; persisted data is never evaluated.
 *
 * @module @comment-tree/engine/engine/TreeCodec
 */

import { z } from "zod";
import type { Label } from "../contracts/Entity.js";
import { TreeParseError, UnknownFeatureError } from "../contracts/Errors.js";
import type { BranchValue, SplitArg } from "../contracts/Feature.js";
import {
    createBranch,
    createLeaf,
    isBranch,
    type TreeNode,
} from "../contracts/TreeNode.js";
import type { FeatureRegistry } from "../features/FeatureRegistry.js";

/**
 * Persisted branch: feature name, split argument, default label, children.
 */
export type ExportedBranch = [
    featureName: string,
    arg: SplitArg,
    defaultLabel: Label,
    children: [BranchValue, ExportedTree][],
];

export type ExportedTree = Label | ExportedBranch;

const SplitArgSchema = z.union([z.string(), z.number().finite(), z.null()]);
const BranchValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const ExportedTreeSchema: z.ZodType<ExportedTree> = z.lazy(() =>
    z.union([
        z.string(),
        z.tuple([
            z.string().min(1),
            SplitArgSchema,
            z.string(),
            z.array(z.tuple([BranchValueSchema, ExportedTreeSchema])).min(1),
        ]),
    ])
);

/**
 * Export a tree to its persisted structure.
 */
export function exportTree(node: TreeNode): ExportedTree {
    if (!isBranch(node)) {
        return node.label;
    }

    const children: [BranchValue, ExportedTree][] = [];
    for (const [value, child] of node.children) {
        children.push([value, exportTree(child)]);
    }
    return [node.feature.name, node.arg, node.defaultLabel, children];
}

/**
 * Rebuild a tree from its persisted structure.
 *
 * @param registry - Features the tree may reference
 * @param data - Untrusted persisted structure
 * @throws TreeParseError if `data` does not match the grammar
 * @throws UnknownFeatureError if a branch names a feature missing from `registry`
 */
export function importTree(registry: FeatureRegistry, data: unknown): TreeNode {
    const parsed = ExportedTreeSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new TreeParseError(issue?.message ?? "invalid tree", formatPath(issue?.path ?? []));
    }
    return buildNode(registry, parsed.data, "$");
}

function buildNode(registry: FeatureRegistry, data: ExportedTree, path: string): TreeNode {
    if (typeof data === "string") {
        return createLeaf(data);
    }

    const [featureName, arg, defaultLabel, entries] = data;
    const feature = registry.get(featureName);
    if (!feature) {
        throw new UnknownFeatureError(featureName);
    }
    if (!feature.isValidArg(arg)) {
        throw new TreeParseError(`argument ${JSON.stringify(arg)} does not fit ${featureName}`, `${path}[1]`);
    }

    const children = new Map<BranchValue, TreeNode>();
    entries.forEach(([value, child], i) => {
        const childPath = `${path}[3][${i}]`;
        if (children.has(value)) {
            throw new TreeParseError(`duplicate branch value ${JSON.stringify(value)}`, childPath);
        }
        children.set(value, buildNode(registry, child, `${childPath}[1]`));
    });

    return createBranch(feature, arg, defaultLabel, children);
}

function formatPath(path: readonly (string | number)[]): string {
    return "$" + path.map((segment) => `[${JSON.stringify(segment)}]`).join("");
}

/**
 * Serialize a tree as JSON text.
 */
export function serializeTree(node: TreeNode, space?: number): string {
    return JSON.stringify(exportTree(node), null, space);
}

/**
 * Parse JSON text produced by `serializeTree()`.
 *
 * @throws TreeParseError on invalid JSON or a malformed tree
 * @throws UnknownFeatureError if a branch names an unregistered feature
 */
export function parseTree(registry: FeatureRegistry, text: string): TreeNode {
    let data: unknown;
    try {
        data = JSON.parse(text);
    }
    catch (error) {
        throw new TreeParseError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }
    return importTree(registry, data);
}

/**
 * Indented, human-readable dump of a tree, one line per node or value.
 *
 * @example
 * ```typescript
 * describeTree(root);
 * // [
 * //   "Branch DF:type: null, default=doc",
 * //   " Value: \"line\" ->",
 * //   "  Leaf doc",
 * //   ...
 * // ]
 * ```
 */
export function describeTree(node: TreeNode, depth = 0): string[] {
    const ind = "  ".repeat(depth);
    if (!isBranch(node)) {
        return [`${ind}Leaf ${node.label}`];
    }

    const lines = [`${ind}Branch ${node.feature.name}: ${JSON.stringify(node.arg)}, default=${node.defaultLabel}`];
    for (const [value, child] of node.children) {
        lines.push(`${ind} Value: ${JSON.stringify(value)} ->`);
        lines.push(...describeTree(child, depth + 1));
    }
    return lines;
}
