import { Expression } from "./expressions";

/** The parser yields a single expression; its root is the whole program. */
export type AST = Expression;

export type ASTNode = Expression;

export type {
    Expression,
    NumberLiteral,
    BinaryExpression,
    BinaryOperator,
} from "./expressions";
