import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST } from "./types";
import { BinaryOperator, Expression } from "./expressions";
import { ParseError } from "../utils/Error";

const OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.Plus]: "+",
    [TokenType.Minus]: "-",
    [TokenType.Multiply]: "*",
    [TokenType.Divide]: "/",
};

export class Parser {
    private tokens: Token[];
    private current: number = 0;

    constructor(tokens: Token[]) {
        this.tokens = tokens;
    }

    public parse(): AST {
        if (this.tokens.length === 0) {
            throw new ParseError("expression is empty");
        }

        const expr = this.expression();

        const leftover = this.peek();
        if (leftover) {
            throw new ParseError("unexpected token", leftover.position);
        }

        return expr;
    }

    // expression := term (('+' | '-') term)*
    private expression(): Expression {
        let left = this.term();

        while (this.match(TokenType.Plus, TokenType.Minus)) {
            const operatorToken = this.previous();
            left = this.binary(operatorToken, left, this.term());
        }

        return left;
    }

    // term := factor (('*' | '/') factor)*
    private term(): Expression {
        let left = this.factor();

        while (this.match(TokenType.Multiply, TokenType.Divide)) {
            const operatorToken = this.previous();
            left = this.binary(operatorToken, left, this.factor());
        }

        return left;
    }

    // factor := NUMBER | '(' expression ')'
    private factor(): Expression {
        if (this.match(TokenType.Number)) {
            const token = this.previous();
            return {
                type: "NumberLiteral",
                value: BigInt(token.value),
                position: token.position,
            };
        }

        if (this.match(TokenType.LParen)) {
            const expr = this.expression();
            this.consume(TokenType.RParen, "expected ')'");
            return expr;
        }

        throw new ParseError("invalid factor", this.peek()?.position);
    }

    /** Folds the accumulated left side under a new operator node. */
    private binary(
        operatorToken: Token,
        left: Expression,
        right: Expression,
    ): Expression {
        const operator = OPERATORS[operatorToken.type];
        if (!operator) {
            throw new ParseError("unexpected token", operatorToken.position);
        }
        return {
            type: "BinaryExpression",
            operator,
            left,
            right,
            position: operatorToken.position,
        };
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();

        const next = this.peek();
        if (next) {
            throw new ParseError(message, next.position);
        }
        // End of input: point just past the last consumed token.
        throw new ParseError(message, this.previous().position + 1);
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private check(type: TokenType): boolean {
        const token = this.peek();
        return token !== undefined && token.type === type;
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.current >= this.tokens.length;
    }

    private peek(): Token | undefined {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }
}
