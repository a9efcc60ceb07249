import type Parser from "tree-sitter";
import type { SyntaxIssue } from "../../core/model.js";

/**
 * Collect the ERROR and MISSING nodes parser recovery left in the tree.
 */
export function collectSyntaxIssues(root: Parser.SyntaxNode): SyntaxIssue[] {
  const issues: SyntaxIssue[] = [];
  const stack: Parser.SyntaxNode[] = [root];

  let node = stack.pop();
  while (node !== undefined) {
    if (node.type === "ERROR" || node.isMissing) {
      issues.push({
        line: node.startPosition.row + 1,
        column: node.startPosition.column + 1,
        message: node.isMissing ? `Missing ${node.type}` : "Syntax error",
      });
    }
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push(child);
    }
    node = stack.pop();
  }

  return issues;
}
