/**
 * Tree Node Contract
 *
 * The induced decision tree: internal branches test one feature, leaves
 * carry a label. Trees are immutable once built or imported.
 */

import type { Label } from "./Entity.js";
import type { BranchValue, Feature, SplitArg } from "./Feature.js";

/**
 * Internal decision node.
 */
export interface TreeBranch {
    readonly kind: "branch";

    readonly feature: Feature;

    readonly arg: SplitArg;

    /** Majority label of the subset that produced this branch */
    readonly defaultLabel: Label;

    /** Children keyed by the values the feature's split produced, in split order */
    readonly children: ReadonlyMap<BranchValue, TreeNode>;
}

/**
 * Terminal prediction node.
 */
export interface TreeLeaf {
    readonly kind: "leaf";
    readonly label: Label;
}

export type TreeNode = TreeBranch | TreeLeaf;

/**
 * Create a frozen branch node.
 */
export function createBranch(
    feature: Feature,
    arg: SplitArg,
    defaultLabel: Label,
    children: ReadonlyMap<BranchValue, TreeNode>
): TreeBranch {
    return Object.freeze({
        kind: "branch",
        feature,
        arg,
        defaultLabel,
        children,
    });
}

/**
 * Create a frozen leaf node.
 */
export function createLeaf(label: Label): TreeLeaf {
    return Object.freeze({ kind: "leaf", label });
}

export function isBranch(node: TreeNode): node is TreeBranch {
    return node.kind === "branch";
}
