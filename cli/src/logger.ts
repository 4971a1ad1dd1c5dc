import pino, { type DestinationStream, type Logger } from "pino";
import pretty from "pino-pretty";
import type { CalculatorConfig } from "./config";

// Логи идут в stderr, stdout остаётся под результаты.
export function createLogger(
    config: Pick<CalculatorConfig, "logLevel" | "logPretty">,
    destination?: DestinationStream,
): Logger {
    if (config.logPretty) {
        return pino(
            { level: config.logLevel },
            pretty({
                destination: destination ?? 2,
                colorize: true,
                singleLine: true,
                translateTime: "SYS:standard",
            }),
        );
    }

    return pino({ level: config.logLevel }, destination ?? pino.destination(2));
}
