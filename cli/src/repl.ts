import { createInterface } from "node:readline";

const EXIT_COMMANDS = new Set(["exit", "quit"]);

// Читает выражения построчно до EOF или до exit/quit; break в цикле сам закрывает rl.
export async function runRepl(input: NodeJS.ReadableStream, handleLine: (line: string) => void): Promise<void> {
    const rl = createInterface({ input, terminal: false });

    for await (const raw of rl) {
        const line = raw.trim();
        if (line === "") {
            continue;
        }
        if (EXIT_COMMANDS.has(line)) {
            break;
        }
        handleLine(line);
    }
}
