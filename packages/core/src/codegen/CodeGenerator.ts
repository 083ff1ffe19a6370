import { AST, Expression, BinaryOperator } from "../parser/types";
import { CompilerError } from "../utils/Error";

export interface Instruction {
    result: string;
    left: string;
    operator: BinaryOperator;
    right: string;
}

export interface GeneratedCode {
    instructions: Instruction[];
    /** Temporary (or literal address) holding the value of the whole expression. */
    result: string;
}

export class CodeGenerator {
    private instructions: Instruction[] = [];
    private tempCount: number = 0;
    private addresses: ReadonlyMap<bigint, string>;

    constructor(addresses: ReadonlyMap<bigint, string>) {
        this.addresses = addresses;
    }

    public generate(ast: AST): GeneratedCode {
        this.instructions = [];
        this.tempCount = 0;

        const result = this.genExp(ast);
        return { instructions: this.instructions, result };
    }

    private newTemp(): string {
        return `t${++this.tempCount}`;
    }

    private emit(instruction: Instruction) {
        this.instructions.push(instruction);
    }

    private genExp(node: Expression): string {
        switch (node.type) {
            case "NumberLiteral": {
                const address = this.addresses.get(node.value);
                if (address === undefined) {
                    throw new CompilerError(
                        `No address assigned to literal ${node.value}`,
                        node.position,
                    );
                }
                return address;
            }
            case "BinaryExpression": {
                const left = this.genExp(node.left);
                const right = this.genExp(node.right);
                const result = this.newTemp();
                this.emit({ result, left, operator: node.operator, right });
                return result;
            }
        }
    }
}
