import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { EvaluationError, calculate, parse, printExpr } from "../../evaluator";
import { BUTTON_LABELS, ERROR_DISPLAY, KeypadSession, formatResult } from "../../keypad";
import { MAX_FRACTION_DIGITS } from "./config";
import type { CalculatorConfig } from "./config";
import { runRepl } from "./repl";

export interface CliIO {
    stdout(text: string): void;
    stderr(text: string): void;
    stdin: NodeJS.ReadableStream;
}

export interface CliContext {
    config: CalculatorConfig;
    logger: Logger;
    io: CliIO;
}

interface CliOptions {
    tree?: boolean;
    keys?: string;
    interactive?: boolean;
    digits?: number;
}

function parseDigits(value: string): number {
    const digits = Number(value);
    if (!Number.isInteger(digits) || digits < 0 || digits > MAX_FRACTION_DIGITS) {
        throw new InvalidArgumentError(`Fraction digits must be an integer between 0 and ${MAX_FRACTION_DIGITS}.`);
    }
    return digits;
}

// Returns false when the expression could not be evaluated.
export function evaluateLine(source: string, showTree: boolean, fractionDigits: number, { logger, io }: CliContext): boolean {
    try {
        const tree = parse(source);
        const result = formatResult(calculate(tree), fractionDigits);
        io.stdout(showTree ? `${printExpr(tree)} = ${result}\n` : `${result}\n`);
        return true;
    } catch (error) {
        if (!(error instanceof EvaluationError)) {
            throw error;
        }
        logger.debug({ code: error.code, expression: source }, "evaluation failed");
        io.stderr(`Error: ${error.message}\n`);
        return false;
    }
}

export function replayKeys(sequence: string, fractionDigits: number, logger: Logger): KeypadSession {
    const session = new KeypadSession({ fractionDigits, logger });
    for (const char of sequence) {
        if (BUTTON_LABELS.includes(char)) {
            session.press(char);
        } else {
            session.key(char);
        }
    }
    return session;
}

export function createProgram(context: CliContext, setExitCode: (code: number) => void): Command {
    const { config, io } = context;

    return new Command()
        .name("safecalc")
        .description("Evaluate arithmetic expressions without executing anything else")
        .argument("[expression...]", "expression to evaluate (use -- before one that starts with '-')")
        .option("--tree", "print the parsed expression in canonical form before the result")
        .option("--keys <sequence>", "replay keypad presses and print the display")
        .option("-i, --interactive", "read expressions from stdin, one per line")
        .option("--digits <n>", "fraction digits shown in results", parseDigits)
        .exitOverride()
        .configureOutput({
            writeOut: text => io.stdout(text),
            writeErr: text => io.stderr(text),
        })
        .action(async (expression: string[], options: CliOptions) => {
            const digits = options.digits ?? config.fractionDigits;
            const showTree = options.tree ?? false;

            if (options.keys !== undefined) {
                const session = replayKeys(options.keys, digits, context.logger);
                io.stdout(`${session.display}\n`);
                setExitCode(session.display === ERROR_DISPLAY ? 1 : 0);
                return;
            }

            if (options.interactive || expression.length === 0) {
                context.logger.debug("starting interactive session");
                await runRepl(io.stdin, line => {
                    evaluateLine(line, showTree, digits, context);
                });
                setExitCode(0);
                return;
            }

            setExitCode(evaluateLine(expression.join(" "), showTree, digits, context) ? 0 : 1);
        });
}

export async function run(argv: string[], context: CliContext): Promise<number> {
    let exitCode = 0;
    const program = createProgram(context, code => {
        exitCode = code;
    });

    try {
        await program.parseAsync(argv, { from: "user" });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }
    return exitCode;
}
