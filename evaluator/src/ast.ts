export type Expr =
    | NumConst
    | BinaryOp
    | UnaryOp;

export interface NumConst {
    type: 'const';
    value: number;
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '^';

export interface BinaryOp {
    type: 'binop';
    op: BinaryOperator;
    left: Expr;
    right: Expr;
}

export type UnaryOperator = '-' | '+';

export interface UnaryOp {
    type: 'unary';
    op: UnaryOperator;
    argument: Expr;
}
