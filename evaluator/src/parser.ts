import { readFileSync } from 'node:fs';
import * as ohm from 'ohm-js';
import type { ActionDict, MatchResult, Node, Semantics } from 'ohm-js';
import type { Expr } from './ast';
import { DisallowedOperatorError, EmptyInputError, NumericFaultError, SyntaxError, withStackGuard } from './errors';
import { binaryOperatorFor, unaryOperatorFor } from './operators';

export const MAX_EXPRESSION_LENGTH = 1000;

export const calculatorGrammar = ohm.grammar(
    readFileSync(new URL('./calculator.ohm', import.meta.url), 'utf-8')
);

// Любая конструкция вне белого списка (сравнения, битовые операции, имена, вызовы)
// разбирается грамматикой, но отвергается здесь, до построения дерева.
function rejected(node: Node, what: string): DisallowedOperatorError {
    return new DisallowedOperatorError(`${what} is not allowed`, node.source.startIdx, node.source.endIdx);
}

function binary(this: Node, left: Node, op: Node, right: Node): Expr {
    const operator = binaryOperatorFor(op.sourceString);
    if (operator === undefined) {
        throw rejected(op, `Operator '${op.sourceString}'`);
    }
    return { type: 'binop', op: operator, left: left.tree(), right: right.tree() };
}

export const getExprTree: ActionDict<Expr> = {
    Assign_assign(target, _eq, _value) {
        throw rejected(this, `Assignment to '${target.sourceString}'`);
    },

    Logic_binary: binary,
    Compare_binary: binary,
    Bitwise_binary: binary,
    Sum_binary: binary,
    Product_binary: binary,
    Power_binary: binary,

    Unary_unary(op, operand) {
        const operator = unaryOperatorFor(op.sourceString);
        if (operator === undefined) {
            throw rejected(op, `Unary operator '${op.sourceString}'`);
        }
        return { type: 'unary', op: operator, argument: operand.tree() };
    },

    Primary_paren(_open, inner, _close) {
        return inner.tree();
    },

    Primary_call(callee, _open, _args, _close) {
        throw rejected(this, `Function call '${callee.sourceString}'`);
    },

    number(_value) {
        const value = Number(this.sourceString);
        if (!Number.isFinite(value)) {
            throw new NumericFaultError(`Number literal '${this.sourceString}' is out of range`);
        }
        return { type: 'const', value };
    },

    name(_head, _tail) {
        throw rejected(this, `Name '${this.sourceString}'`);
    }
};

export const semantics = calculatorGrammar.createSemantics() as CalculatorSemantics;
semantics.addOperation<Expr>("tree()", getExprTree);

export interface CalculatorSemantics extends Semantics {
    (match: MatchResult): CalculatorActions;
}

export interface CalculatorActions {
    tree(): Expr;
}

export function match(source: string): MatchResult {
    if (source.trim() === '') {
        throw new EmptyInputError();
    }
    if (source.length > MAX_EXPRESSION_LENGTH) {
        throw new SyntaxError(`Expression is longer than ${MAX_EXPRESSION_LENGTH} characters`);
    }

    const matchResult = withStackGuard(() => calculatorGrammar.match(source));
    if (matchResult.failed()) {
        throw new SyntaxError(matchResult.shortMessage ?? 'Syntax error');
    }
    return matchResult;
}

export function parseExpr(source: string): Expr {
    const matchResult = match(source);
    return withStackGuard(() => semantics(matchResult).tree());
}
