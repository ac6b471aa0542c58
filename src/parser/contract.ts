import { ConcreteTreeContractError } from "../errors";
import type { ConcreteNode } from "./concrete";

/**
 * Checks the guarantees the grammar engine makes about its trees. Violations
 * are collaborator bugs and surface as ConcreteTreeContractError, never as
 * diagnostics.
 */
export function assertConcreteContract(root: ConcreteNode, sourceLength: number): void {
  checkRange(root, sourceLength);
  visit(root, [], sourceLength);
}

function visit(node: ConcreteNode, sameRangeAncestors: ConcreteNode[], sourceLength: number): void {
  let previousEnd = node.startIndex;
  for (const child of node.children()) {
    checkRange(child, sourceLength);
    if (child.startIndex < node.startIndex || child.endIndex > node.endIndex) {
      throw new ConcreteTreeContractError(
        `concrete tree: ${child.kind} [${child.startIndex}, ${child.endIndex}) escapes parent ${node.kind} [${node.startIndex}, ${node.endIndex})`,
        child,
      );
    }
    if (child.startIndex < previousEnd) {
      throw new ConcreteTreeContractError(`concrete tree: ${child.kind} at ${child.startIndex} overlaps its previous sibling`, child);
    }
    previousEnd = child.endIndex;

    // A cycle can only revisit a node through a chain of equal ranges.
    const chain = child.startIndex === node.startIndex && child.endIndex === node.endIndex ? [...sameRangeAncestors, node] : [];
    if (chain.some((ancestor) => ancestor.kind === child.kind)) {
      throw new ConcreteTreeContractError(`concrete tree: ${child.kind} is its own ancestor`, child);
    }
    visit(child, chain, sourceLength);
  }
}

function checkRange(node: ConcreteNode, sourceLength: number): void {
  const { startIndex, endIndex } = node;
  if (!Number.isInteger(startIndex) || !Number.isInteger(endIndex) || startIndex < 0 || endIndex < startIndex) {
    throw new ConcreteTreeContractError(`concrete tree: ${node.kind} has invalid range [${startIndex}, ${endIndex})`, node);
  }
  if (endIndex > sourceLength) {
    throw new ConcreteTreeContractError(
      `concrete tree: ${node.kind} ends at ${endIndex}, past the source length ${sourceLength}`,
      node,
    );
  }
}
