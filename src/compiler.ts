import * as fs from "fs";
import * as colors from "@colors/colors/safe";
import { Command, CommanderError } from "commander";
import { BehaviorRegistry } from "./behavior_registry";
import { renderVhdlDecoder } from "./decoder_vhdl";
import { ConfigurationError } from "./errors";
import { CompilerOptions, consoleOptions, LogWriter } from "./options";
import { CompiledRegisterFile, compileRegisterFile } from "./regfile";
import { RegisterFileXml } from "./regfile_xml";
import { Block } from "./register";
import { renderReport } from "./report";

export type CompileCommandOptions = {
    output?: string;
    vhdl: boolean;
    optimize?: boolean;
    verbose: number;
};

/**
 * Command line front end: loads an XML register file description, compiles
 * it and writes the register map (and optionally the decoders).
 */
export class RegisterFileCompiler {
    /** Compiler options */
    public options: CompilerOptions;

    /** Parsed command line */
    public command: CompileCommandOptions = { vhdl: false, verbose: 0 };

    /** Input file */
    public input: string = "";

    constructor(private stdout: LogWriter = process.stdout, private stderr: LogWriter = process.stderr) {
        this.options = consoleOptions(0, stderr);
    }

    /**
     * Run compiler
     * @param argv arguments (including the node executable and script)
     * @returns exit code
     */
    run(argv: string[]): Promise<number> {
        return Promise.resolve().then(() => {
            if (!this.parseOptions(argv)) {
                return 1;
            }
            return this.compile();
        })
        .catch((reason: unknown) => {
            if (reason instanceof CommanderError) {
                // Already reported by commander
                return reason.exitCode;
            }
            if (reason instanceof ConfigurationError) {
                this.options.printErr(reason.message);
            } else {
                let text = (reason instanceof Error) ? (reason.stack ?? reason.message) : String(reason);
                this.stderr.write(colors.red(text) + "\n");
            }
            return 1;
        });
    }

    parseOptions(argv: string[]): boolean {
        let program = new Command();
        program
        .name("regfile-compile")
        .usage("[options] <file>")
        .description("Register file compiler")
        .argument("[file]", "XML register file description")
        .option("-o, --output <file>", "Write the output to a file instead of stdout")
        .option("--vhdl", "Append the address decoders as VHDL", false)
        .option("--optimize", "Assume unclaimed addresses are never accessed")
        .option("--no-optimize", "Decode every address bit")
        .option("-v, --verbose", "Increase verbosity", (value: string, total: number) => (total + 1), 0)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => this.stdout.write(text),
            writeErr: (text) => this.stderr.write(text),
        })
        .parse(argv);
        this.command = program.opts<CompileCommandOptions>();
        this.options.verbose = this.command.verbose;
        if (program.args.length === 0) {
            this.options.printErr("No register file specified");
            this.stderr.write(program.helpInformation());
            return false;
        }
        if (program.args.length > 1) {
            this.options.printErr("Only one register file can be specified");
            this.stderr.write(program.helpInformation());
            return false;
        }
        this.input = program.args[0];
        return true;
    }

    compile(): Promise<number> {
        this.options.printInfo(`Loading register file: ${this.input}`, 1);
        return RegisterFileXml.parse(fs.readFileSync(this.input))
        .then((config) => {
            if (this.command.optimize != null) {
                config.optimize = this.command.optimize;
            }
            let regfile = compileRegisterFile(config, new BehaviorRegistry(), this.options);
            let text = this.render(regfile);
            if (this.command.output != null) {
                fs.writeFileSync(this.command.output, text);
                this.options.printInfo(`Written: ${this.command.output}`, 1);
            } else {
                this.stdout.write(text);
            }
            return 0;
        });
    }

    render(regfile: CompiledRegisterFile): string {
        let text = renderReport(regfile);
        if (this.command.vhdl) {
            let action = (block: Block) => `${block.name.replace(/\./g, "_")}_sel <= '1';`;
            for (let table of [regfile.read, regfile.write]) {
                text += `\n-- ${table.direction} decoder\n`;
                text += renderVhdlDecoder(table.decoder, { action });
            }
        }
        return text;
    }
}
