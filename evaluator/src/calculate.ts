import type { Expr } from "./ast";
import { DisallowedOperatorError, NumericFaultError, withStackGuard } from "./errors";
import { applyBinary, applyUnary } from "./operators";

export function calculate(e: Expr): number {
    return withStackGuard(() => reduce(e));
}

function reduce(e: Expr): number {
    switch (e.type) {
        case 'const':
            if (typeof e.value !== 'number' || !Number.isFinite(e.value)) {
                throw new NumericFaultError(`Invalid number literal: ${String(e.value)}`);
            }
            return e.value;

        case 'unary':
            return applyUnary(e.op, reduce(e.argument));

        case 'binop':
            // оба операнда вычисляются до применения операции
            return applyBinary(e.op, reduce(e.left), reduce(e.right));

        default:
            throw new DisallowedOperatorError(`Unknown expression type: ${describe(e)}`);
    }
}

function describe(node: unknown): string {
    if (typeof node === 'object' && node !== null && 'type' in node) {
        return String(node.type);
    }
    return typeof node;
}
