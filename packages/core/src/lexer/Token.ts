import { TokenType } from "./TokenType";

export interface Token {
    readonly type: TokenType;
    readonly value: string;
    /** Zero-based offset of the token's first character. */
    readonly position: number;
}
