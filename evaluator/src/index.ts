import type { Expr } from "./ast";
import { calculate } from "./calculate";
import { parseExpr } from "./parser";

export type { Expr, NumConst, BinaryOp, UnaryOp, BinaryOperator, UnaryOperator } from "./ast";
export type { EvaluationErrorCode } from "./errors";
export { EvaluationError, EmptyInputError, SyntaxError, DisallowedOperatorError, NumericFaultError } from "./errors";
export { calculatorGrammar, parseExpr, MAX_EXPRESSION_LENGTH } from "./parser";
export { calculate } from "./calculate";
export { printExpr } from "./printExpr";

export function evaluate(expression: string): number {
    return calculate(parse(expression));
}

export function parse(expression: string): Expr {
    return parseExpr(expression);
}
