import type { Element } from "@archlens/extract";
import type { ClassificationRule, RuleTarget } from "../defaults.js";
import type { BoundaryType } from "../model.js";

interface CompiledRule {
  regex: RegExp;
  appliesTo: RuleTarget;
  type: BoundaryType;
}

export interface ClassifierOptions {
  /** Fall back to enclosing qualified-name segments, innermost first. */
  useEnclosingScope: boolean;
}

/**
 * Assigns a boundary type to an element from an ordered rule table. Each rule
 * tests the name, any modifier, or the path; the first rule in table order
 * that matches wins.
 */
export class PatternClassifier {
  private readonly rules: readonly CompiledRule[];

  /** Rules must already be validated; see `loadConfig`. */
  constructor(rules: readonly ClassificationRule[], private readonly options: ClassifierOptions) {
    this.rules = rules.map((rule) => ({
      // Stateless matching: drop g and y
      regex: new RegExp(rule.pattern, rule.flags?.replace(/[gy]/g, "")),
      appliesTo: rule.appliesTo,
      type: rule.type,
    }));
  }

  classify(element: Element): BoundaryType {
    const matched = this.rules.find((rule) => matchesElement(rule, element));
    if (matched) return matched.type;

    if (this.options.useEnclosingScope) {
      const segments = element.qualifiedName.split(".").slice(0, -1).reverse();
      for (const segment of segments) {
        const byScope = this.rules.find((rule) => rule.appliesTo === "name" && matches(rule, segment));
        if (byScope) return byScope.type;
      }
    }

    return "utility";
  }
}

function matches(rule: CompiledRule, value: string): boolean {
  return value.length > 0 && rule.regex.test(value);
}

function matchesElement(rule: CompiledRule, element: Element): boolean {
  switch (rule.appliesTo) {
    case "name":
      return matches(rule, element.name);
    case "modifier":
      return element.modifiers.some((modifier) => matches(rule, modifier));
    case "path":
      return matches(rule, element.filePath);
  }
}
