import { AST, Expression } from "../parser/types";

export type LiteralType = "integer";

export interface SymbolEntry {
    /** Decimal form of the literal's value. */
    symbol: string;
    address: string;
}

export interface TypeEntry {
    symbol: string;
    type: LiteralType;
}

export interface SemanticTables {
    symbols: SymbolEntry[];
    types: TypeEntry[];
    /** Literal value to its storage address, consumed by code generation. */
    addresses: Map<bigint, string>;
}

/**
 * Collects the distinct integer literals of an expression, assigning each a
 * synthetic address (`dir_1`, `dir_2`, ...) in left-to-right reading order.
 */
export class SymbolTableBuilder {
    private symbols: SymbolEntry[] = [];
    private types: TypeEntry[] = [];
    private addresses: Map<bigint, string> = new Map();

    public build(ast: AST): SemanticTables {
        this.symbols = [];
        this.types = [];
        this.addresses = new Map();

        this.visit(ast);

        return {
            symbols: this.symbols,
            types: this.types,
            addresses: this.addresses,
        };
    }

    private visit(node: Expression): void {
        switch (node.type) {
            case "NumberLiteral":
                this.declare(node.value);
                return;
            case "BinaryExpression":
                this.visit(node.left);
                this.visit(node.right);
                return;
        }
    }

    private declare(value: bigint): void {
        if (this.addresses.has(value)) return;

        const address = `dir_${this.addresses.size + 1}`;
        const symbol = value.toString();
        this.addresses.set(value, address);
        this.symbols.push({ symbol, address });
        this.types.push({ symbol, type: "integer" });
    }
}
