import type { Logger } from "pino";
import { evaluate, EvaluationError } from "../../evaluator";
import { DEFAULT_FRACTION_DIGITS, formatResult } from "./format";

export interface KeypadOptions {
    fractionDigits?: number;
    logger?: Logger;
}

export const ERROR_DISPLAY = "Error";

const OPERATORS = "+-*/";

// кнопки калькулятора -> символы выражения
const buttonOperators: ReadonlyMap<string, string> = new Map([
    ["÷", "/"],
    ["×", "*"],
    ["−", "-"],
    ["+", "+"],
]);

export const BUTTON_LABELS: readonly string[] = [
    "C", "⌫", "±", "%", "=", ...buttonOperators.keys(),
    "0", "1", "2", "3", "4", "5", "6", "7", "8", "9", ".",
];

function isDigit(char: string): boolean {
    return char.length === 1 && char >= "0" && char <= "9";
}

function isNumberChar(char: string): boolean {
    return isDigit(char) || char === ".";
}

// Индекс, с которого начинается последнее число в выражении.
function trailingNumberStart(expr: string): number {
    let i = expr.length;
    while (i > 0 && isNumberChar(expr[i - 1])) {
        i--;
    }
    return i;
}

// '-' в позиции i унарный, если стоит в начале или сразу после другого оператора
function isUnaryMinusAt(expr: string, i: number): boolean {
    return i >= 0 && expr[i] === "-" && (i === 0 || OPERATORS.includes(expr[i - 1]));
}

/**
 * Headless model of the calculator keypad: accumulates the expression line from
 * button presses and keystrokes and keeps the result display up to date.
 */
export class KeypadSession {
    #expression = "";
    #display = "0";
    readonly #fractionDigits: number;
    readonly #logger?: Logger;

    constructor(options: KeypadOptions = {}) {
        this.#fractionDigits = options.fractionDigits ?? DEFAULT_FRACTION_DIGITS;
        this.#logger = options.logger;
    }

    get expression(): string {
        return this.#expression;
    }

    get display(): string {
        return this.#display;
    }

    press(label: string): void {
        switch (label) {
            case "C":
                return this.clear();
            case "⌫":
                return this.backspace();
            case "±":
                return this.toggleSign();
            case "%":
                return this.percent();
            case "=":
                return this.equals();
        }

        const op = buttonOperators.get(label);
        if (op !== undefined) {
            this.appendOperator(op);
        } else if (isNumberChar(label)) {
            this.appendChar(label);
        }
    }

    key(key: string): void {
        if (isNumberChar(key)) {
            this.appendChar(key);
        } else if (key.length === 1 && OPERATORS.includes(key)) {
            this.appendOperator(key);
        } else if (key === "Enter" || key === "=") {
            this.equals();
        } else if (key === "Backspace") {
            this.backspace();
        } else if (key === "Escape") {
            this.clear();
        }
    }

    appendChar(char: string): void {
        if (!isNumberChar(char)) {
            return;
        }
        if (char === "." && this.#expression.slice(trailingNumberStart(this.#expression)).includes(".")) {
            return;
        }
        this.#expression += char;
        this.refreshPreview();
    }

    appendOperator(op: string): void {
        if (op.length !== 1 || !OPERATORS.includes(op)) {
            return;
        }

        let expr = this.#expression;
        if (expr !== "" && OPERATORS.includes(expr[expr.length - 1])) {
            expr = expr.slice(0, -1);
        }
        // пустое выражение может начинаться только с минуса
        if (expr === "" && op !== "-") {
            return;
        }
        this.#expression = expr + op;
        this.refreshPreview();
    }

    backspace(): void {
        this.#expression = this.#expression.slice(0, -1);
        this.refreshPreview();
    }

    clear(): void {
        this.#expression = "";
        this.#display = "0";
    }

    toggleSign(): void {
        const expr = this.#expression;
        const start = trailingNumberStart(expr);
        if (start === expr.length) {
            return;
        }

        const number = expr.slice(start);
        this.#expression = isUnaryMinusAt(expr, start - 1)
            ? expr.slice(0, start - 1) + number
            : expr.slice(0, start) + "-" + number;
        this.refreshPreview();
    }

    percent(): void {
        const expr = this.#expression;
        let start = trailingNumberStart(expr);
        if (isUnaryMinusAt(expr, start - 1)) {
            start--;
        }

        const value = Number(expr.slice(start));
        if (start === expr.length || Number.isNaN(value)) {
            return;
        }
        this.#expression = expr.slice(0, start) + formatResult(value / 100, this.#fractionDigits);
        this.refreshPreview();
    }

    equals(): void {
        if (this.#expression === "") {
            return;
        }
        const result = this.tryEvaluate();
        this.#display = result ?? ERROR_DISPLAY;
    }

    private refreshPreview(): void {
        if (this.#expression === "") {
            this.#display = "0";
            return;
        }
        // незаконченное выражение ("2+") не трогает дисплей
        this.#display = this.tryEvaluate() ?? this.#display;
    }

    private tryEvaluate(): string | undefined {
        try {
            return formatResult(evaluate(this.#expression), this.#fractionDigits);
        } catch (error) {
            if (!(error instanceof EvaluationError)) {
                throw error;
            }
            this.#logger?.debug({ code: error.code, expression: this.#expression }, error.message);
            return undefined;
        }
    }
}
