export type Expression = NumberLiteral | BinaryExpression;

export type BinaryOperator = "+" | "-" | "*" | "/";

export interface NumberLiteral {
    readonly type: "NumberLiteral";
    readonly value: bigint;
    readonly position: number;
}

export interface BinaryExpression {
    readonly type: "BinaryExpression";
    readonly operator: BinaryOperator;
    readonly left: Expression;
    readonly right: Expression;
    /** Offset of the operator token. */
    readonly position: number;
}
