import { ConfigError, loadConfig } from "./config";
import type { CalculatorConfig } from "./config";
import { createLogger } from "./logger";
import { run } from "./program";

async function main(): Promise<number> {
    let config: CalculatorConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            createLogger({ logLevel: "error", logPretty: false }).error({ issues: error.issues }, error.message);
            return 2;
        }
        throw error;
    }

    const logger = createLogger(config);
    return run(process.argv.slice(2), {
        config,
        logger,
        io: {
            stdout: text => process.stdout.write(text),
            stderr: text => process.stderr.write(text),
            stdin: process.stdin,
        },
    });
}

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    }
);
