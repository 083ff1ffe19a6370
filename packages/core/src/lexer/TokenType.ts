export enum TokenType {
    Number = "NUMBER",

    // Operators
    Plus = "PLUS", // +
    Minus = "MINUS", // -
    Multiply = "MUL", // *
    Divide = "DIV", // /

    // Grouping
    LParen = "LPAREN", // (
    RParen = "RPAREN", // )
}
