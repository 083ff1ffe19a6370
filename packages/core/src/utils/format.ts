import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { Expression } from "../parser/types";
import { Instruction } from "../codegen/CodeGenerator";
import { SymbolEntry, TypeEntry } from "../semantic/SymbolTableBuilder";
import { CompilationResult } from "../compiler";

export function formatToken(token: Token): string {
    if (token.type === TokenType.Number) {
        return `<${token.type}, ${token.value}>`;
    }
    return `<${token.type}>`;
}

export function formatTokens(tokens: Token[]): string {
    return tokens.map(formatToken).join(" ");
}

/** Indented depth-first rendering, two spaces per level. */
export function formatAst(node: Expression, depth: number = 0): string {
    const indent = "  ".repeat(depth);
    switch (node.type) {
        case "NumberLiteral":
            return `${indent}Número(${node.value})`;
        case "BinaryExpression":
            return [
                `${indent}Operador('${node.operator}')`,
                formatAst(node.left, depth + 1),
                formatAst(node.right, depth + 1),
            ].join("\n");
    }
}

export function formatInstruction(instruction: Instruction): string {
    const { result, left, operator, right } = instruction;
    return `${result} = ${left} ${operator} ${right}`;
}

export function formatSymbolEntry(entry: SymbolEntry): string {
    return `Symbol: ${entry.symbol}, Address: ${entry.address}`;
}

export function formatTypeEntry(entry: TypeEntry): string {
    return `Symbol: ${entry.symbol}, Type: ${entry.type}`;
}

export type SerializedNode =
    | { type: "NumberLiteral"; value: string; position: number }
    | {
          type: "BinaryExpression";
          operator: string;
          left: SerializedNode;
          right: SerializedNode;
          position: number;
      };

export interface SerializedResult {
    tokens: Token[];
    ast: SerializedNode;
    symbols: SymbolEntry[];
    types: TypeEntry[];
    instructions: string[];
    result: string;
}

function serializeNode(node: Expression): SerializedNode {
    switch (node.type) {
        case "NumberLiteral":
            return {
                type: node.type,
                value: node.value.toString(),
                position: node.position,
            };
        case "BinaryExpression":
            return {
                type: node.type,
                operator: node.operator,
                left: serializeNode(node.left),
                right: serializeNode(node.right),
                position: node.position,
            };
    }
}

/** JSON-safe view of a compilation; literal values become decimal strings. */
export function serializeResult(result: CompilationResult): SerializedResult {
    return {
        tokens: result.tokens,
        ast: serializeNode(result.ast),
        symbols: result.symbols,
        types: result.types,
        instructions: result.instructions.map(formatInstruction),
        result: result.result,
    };
}
