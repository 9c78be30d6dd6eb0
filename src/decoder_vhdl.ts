import { DecoderNode } from "./decoder";

export interface VhdlDecoderOptions<A> {
    /** Name of the address signal (default `address`) */
    signal?: string;
    /** Text of one action; defaults to `String(action)` */
    action?: (action: A) => string;
}

const INDENT = "  ";

function indent(lines: string[], levels: number = 1): string[] {
    let prefix = INDENT.repeat(levels);
    return lines.map((line) => (line === "") ? line : prefix + line);
}

/**
 * Renders a decoder tree as VHDL `if`/`case` statements.
 */
export function renderVhdlDecoder<A>(tree: DecoderNode<A> | null, options: VhdlDecoderOptions<A> = {}): string {
    let signal = options.signal ?? "address";
    let action = options.action ?? ((a: A) => String(a));

    // A nested single-bit branch or guard starts with `if` and can become
    // an `elsif` of the enclosing statement
    let flattens = (node: DecoderNode<A>): boolean =>
        node.kind === "guard" || (node.kind === "branch" && node.high === node.low && node.others);

    let render = (node: DecoderNode<A>): string[] => {
        switch (node.kind) {
            case "leaf": {
                let lines = [`-- ${signal} = ${node.pattern.bits()}`];
                for (let a of node.actions) {
                    lines.push(...action(a).split("\n"));
                }
                return lines;
            }
            case "guard":
                return [
                    `if ${signal}(${node.high} downto ${node.low}) = "${node.literal}" then`,
                    ...indent(render(node.body)),
                    "end if;",
                ];
            case "branch":
                if (node.high === node.low && node.others) {
                    return renderIf(node.high, node.arms[0].body, node.arms[1].body);
                }
                return renderCase(node.high, node.low, node.arms, node.others);
            case "sequence": {
                let lines: string[] = [];
                node.parts.forEach((part, i) => {
                    if (i > 0) {
                        lines.push("");
                    }
                    lines.push(...render(part));
                });
                return lines;
            }
        }
    };

    let renderIf = (bit: number, zero: DecoderNode<A>, one: DecoderNode<A>): string[] => {
        // Chain the `1` side when possible so the `0` test reads first
        let swap = !flattens(one) && flattens(zero);
        let thenLit = swap ? "1" : "0";
        let thenNode = swap ? one : zero;
        let elseNode = swap ? zero : one;
        let lines = [`if ${signal}(${bit}) = '${thenLit}' then`, ...indent(render(thenNode))];
        let rest = render(elseNode);
        if (flattens(elseNode)) {
            lines.push(`els${rest[0]}`, ...rest.slice(1));
        } else {
            lines.push("else", ...indent(rest), "end if;");
        }
        return lines;
    };

    let renderCase = (high: number, low: number,
                      arms: { literal: string; body: DecoderNode<A> }[], others: boolean): string[] => {
        let lines = [`case ${signal}(${high} downto ${low}) is`];
        arms.forEach((arm, i) => {
            if (others && i === arms.length - 1) {
                lines.push(`${INDENT}when others => -- "${arm.literal}"`);
            } else {
                lines.push(`${INDENT}when "${arm.literal}" =>`);
            }
            lines.push(...indent(render(arm.body), 2));
        });
        if (!others) {
            lines.push(`${INDENT}when others =>`, `${INDENT}${INDENT}null;`);
        }
        lines.push("end case;");
        return lines;
    };

    if (tree == null) {
        return "";
    }
    return render(tree).join("\n") + "\n";
}
