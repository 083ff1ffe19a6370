export { Lexer } from "./lexer/Lexer";
export { Parser } from "./parser/Parser";
export { SymbolTableBuilder } from "./semantic/SymbolTableBuilder";
export { CodeGenerator } from "./codegen/CodeGenerator";
export { TokenType } from "./lexer/TokenType";
export type { Token } from "./lexer/Token";
export * from "./parser/types";
export type {
    SymbolEntry,
    TypeEntry,
    LiteralType,
    SemanticTables,
} from "./semantic/SymbolTableBuilder";
export type { Instruction, GeneratedCode } from "./codegen/CodeGenerator";

export { compile } from "./compiler";
export type { CompilationResult } from "./compiler";
export * from "./utils/format";
export {
    CompilerError,
    LexicalError,
    ParseError,
    formatDiagnostic,
} from "./utils/Error";
export type { DiagnosticOptions } from "./utils/Error";
