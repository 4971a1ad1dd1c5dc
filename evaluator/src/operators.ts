import type { BinaryOperator, UnaryOperator } from "./ast";
import { DisallowedOperatorError, NumericFaultError } from "./errors";

type BinaryFn = (left: number, right: number) => number;
type UnaryFn = (operand: number) => number;

// Единственные операции, которые вычислитель умеет выполнять.
const binaryOperations: ReadonlyMap<string, BinaryFn> = new Map<BinaryOperator, BinaryFn>([
    ['+', (left, right) => left + right],
    ['-', (left, right) => left - right],
    ['*', (left, right) => left * right],
    ['/', divide],
    ['%', modulo],
    ['^', power],
]);

const unaryOperations: ReadonlyMap<string, UnaryFn> = new Map<UnaryOperator, UnaryFn>([
    ['-', operand => -operand],
    ['+', operand => operand],
]);

// Source spellings accepted for each operator; '**' is an alias of '^'.
const binarySymbols: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
    ['+', '+'],
    ['-', '-'],
    ['*', '*'],
    ['/', '/'],
    ['%', '%'],
    ['^', '^'],
    ['**', '^'],
]);

const unarySymbols: ReadonlyMap<string, UnaryOperator> = new Map<string, UnaryOperator>([
    ['-', '-'],
    ['+', '+'],
]);

export function binaryOperatorFor(symbol: string): BinaryOperator | undefined {
    return binarySymbols.get(symbol);
}

export function unaryOperatorFor(symbol: string): UnaryOperator | undefined {
    return unarySymbols.get(symbol);
}

export function applyBinary(op: string, left: number, right: number): number {
    const operation = binaryOperations.get(op);
    if (operation === undefined) {
        throw new DisallowedOperatorError(`Operator '${op}' is not allowed`);
    }
    return checked(operation(left, right));
}

export function applyUnary(op: string, operand: number): number {
    const operation = unaryOperations.get(op);
    if (operation === undefined) {
        throw new DisallowedOperatorError(`Unary operator '${op}' is not allowed`);
    }
    return checked(operation(operand));
}

function divide(left: number, right: number): number {
    if (right === 0) {
        throw new NumericFaultError('Division by zero');
    }
    return left / right;
}

// Остаток берёт знак делителя: 7 % -3 = -2, -7 % 3 = 2
function modulo(left: number, right: number): number {
    if (right === 0) {
        throw new NumericFaultError('Modulo by zero');
    }
    let result = left % right;
    if (result !== 0 && (right < 0) !== (result < 0)) {
        result += right;
    }
    return result;
}

function power(base: number, exponent: number): number {
    if (base === 0 && exponent < 0) {
        throw new NumericFaultError('Zero cannot be raised to a negative power');
    }
    return base ** exponent;
}

function checked(value: number): number {
    if (Number.isNaN(value)) {
        throw new NumericFaultError('Result is not a real number');
    }
    if (!Number.isFinite(value)) {
        throw new NumericFaultError('Numeric overflow');
    }
    return value;
}
