import { ParsingContext } from "./context.js";
import { DistanceExpression } from "./distance.js";
import { describeValue, type Expression } from "./types.js";

export type ExpressionParser = (args: readonly unknown[], ctx: ParsingContext) => Expression | null;

const parsers = new Map<string, ExpressionParser>([["distance", DistanceExpression.parse]]);

export function registerExpression(operator: string, parser: ExpressionParser): void {
  if (parsers.has(operator)) return;
  parsers.set(operator, parser);
}

export function unregisterExpression(operator: string): void {
  parsers.delete(operator);
}

export function getExpressionParser(operator: string): ExpressionParser | undefined {
  return parsers.get(operator);
}

export function getRegisteredOperators(): string[] {
  return Array.from(parsers.keys()).sort();
}

export function parseExpression(value: unknown, ctx: ParsingContext = new ParsingContext()): Expression | null {
  if (!Array.isArray(value)) {
    ctx.error(`Expected an array, but found ${describeValue(value)} instead.`);
    return null;
  }
  if (value.length === 0) {
    ctx.error('Expected an array with at least one element. If you wanted a literal array, use ["literal", []].');
    return null;
  }
  const [operator] = value;
  if (typeof operator !== "string") {
    ctx.error(
      `Expression name must be a string, but found ${describeValue(operator)} instead. ` +
        'If you wanted a literal array, use ["literal", [...]].',
      0
    );
    return null;
  }
  const parser = parsers.get(operator);
  if (!parser) {
    ctx.error(`Unknown expression "${operator}". If you wanted a literal array, use ["literal", [...]].`, 0);
    return null;
  }
  return parser(value, ctx);
}
