import type { Expr, BinaryOperator } from "./ast";

const precedence: Record<BinaryOperator, number> = {
    '+': 1,
    '-': 1,
    '*': 2,
    '/': 2,
    '%': 2,
    '^': 4
};

// унарный минус связывает слабее степени, но сильнее умножения: -2 ^ 2 = -(2 ^ 2)
const UNARY_PRECEDENCE = 3;
const ATOM_PRECEDENCE = 5;

function precedenceOf(e: Expr): number {
    switch (e.type) {
        case 'const':
            return e.value < 0 ? UNARY_PRECEDENCE : ATOM_PRECEDENCE;
        case 'unary':
            return UNARY_PRECEDENCE;
        case 'binop':
            return precedence[e.op];
    }
}

// Грамматика не знает экспоненты, поэтому 1e21 и 1e-7 печатаем цифрами.
function plainNumber(value: number): string {
    if (Number.isInteger(value)) {
        return BigInt(value).toString();
    }
    const exponential = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/.exec(value.toString());
    if (exponential === null) {
        return value.toString();
    }
    const [, sign, head, tail = '', exponent] = exponential;
    return `${sign}0.${'0'.repeat(Number(exponent) - 1)}${head}${tail}`;
}

function wrap(text: string, needsParens: boolean): string {
    return needsParens ? `(${text})` : text;
}

export function printExpr(e: Expr): string {
    switch (e.type) {
        case 'const':
            return plainNumber(e.value);

        case 'unary': {
            const arg = printExpr(e.argument);
            return `${e.op}${wrap(arg, precedenceOf(e.argument) < UNARY_PRECEDENCE)}`;
        }

        case 'binop': {
            const own = precedence[e.op];
            const leftPrec = precedenceOf(e.left);
            const rightPrec = precedenceOf(e.right);

            // '^' правоассоциативна: скобки нужны слева, а справа допустим унарный знак (2 ^ -1)
            const isPower = e.op === '^';
            const leftParens = isPower ? leftPrec <= own : leftPrec < own;
            const rightParens = isPower ? rightPrec < UNARY_PRECEDENCE : rightPrec <= own;

            const left = wrap(printExpr(e.left), leftParens);
            const right = wrap(printExpr(e.right), rightParens);
            return `${left} ${e.op} ${right}`;
        }
    }
}
