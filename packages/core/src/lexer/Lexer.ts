import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { LexicalError } from "../utils/Error";

// ASCII controls, the information separators (U+001C-U+001F), NEL and the
// Unicode space separators. U+FEFF is not whitespace.
const WHITESPACE =
    /[\t\n\v\f\r \x1c-\x1f\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]/;

const SYMBOLS: Record<string, TokenType> = {
    "+": TokenType.Plus,
    "-": TokenType.Minus,
    "*": TokenType.Multiply,
    "/": TokenType.Divide,
    "(": TokenType.LParen,
    ")": TokenType.RParen,
};

export class Lexer {
    private input: string;
    private position: number = 0;

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): Token[] {
        const tokens: Token[] = [];

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (this.isDigit(char)) {
                tokens.push(this.readNumber());
                continue;
            }

            const symbol = SYMBOLS[char];
            if (symbol) {
                tokens.push(this.createToken(symbol, char));
                this.advance();
                continue;
            }

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            throw new LexicalError(char, this.position);
        }

        return tokens;
    }

    private createToken(type: TokenType, value: string): Token {
        return { type, value, position: this.position };
    }

    private advance() {
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private isWhitespace(char: string): boolean {
        return WHITESPACE.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const start = this.position;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        return { type: TokenType.Number, value, position: start };
    }
}
