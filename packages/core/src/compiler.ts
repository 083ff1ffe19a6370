import { Lexer } from "./lexer/Lexer";
import { Token } from "./lexer/Token";
import { Parser } from "./parser/Parser";
import { AST } from "./parser/types";
import {
    SymbolTableBuilder,
    SymbolEntry,
    TypeEntry,
} from "./semantic/SymbolTableBuilder";
import { CodeGenerator, Instruction } from "./codegen/CodeGenerator";

export interface CompilationResult {
    tokens: Token[];
    ast: AST;
    symbols: SymbolEntry[];
    types: TypeEntry[];
    instructions: Instruction[];
    result: string;
}

/**
 * Runs every phase over `source`. The first LexicalError or ParseError
 * propagates untouched; nothing partial is returned.
 */
export function compile(source: string): CompilationResult {
    const tokens = new Lexer(source).tokenize();
    const ast = new Parser(tokens).parse();

    const { symbols, types, addresses } = new SymbolTableBuilder().build(ast);
    const { instructions, result } = new CodeGenerator(addresses).generate(ast);

    return { tokens, ast, symbols, types, instructions, result };
}
