import { describe, it, expect } from "vitest";
import pino from "pino";
import { KeypadSession } from "../index";

function pressAll(session: KeypadSession, labels: string[]): KeypadSession {
    for (const label of labels) {
        session.press(label);
    }
    return session;
}

describe("KeypadSession", () => {
    it("starts empty with a zero display", () => {
        const session = new KeypadSession();
        expect(session.expression).toBe("");
        expect(session.display).toBe("0");
    });

    it("previews the result while typing", () => {
        const session = pressAll(new KeypadSession(), ["1", "2", "+", "3"]);
        expect(session.expression).toBe("12+3");
        expect(session.display).toBe("15");
    });

    it("keeps the last preview while the expression is incomplete", () => {
        const session = pressAll(new KeypadSession(), ["1", "2", "×"]);
        expect(session.expression).toBe("12*");
        expect(session.display).toBe("12");
    });

    it("maps button operators to expression operators", () => {
        const session = pressAll(new KeypadSession(), ["8", "÷", "2", "×", "3", "−", "1", "+", "4"]);
        expect(session.expression).toBe("8/2*3-1+4");
        expect(session.display).toBe("15");
    });

    it("replaces an operator typed right after another", () => {
        const session = pressAll(new KeypadSession(), ["5", "+", "×", "2"]);
        expect(session.expression).toBe("5*2");
    });

    it("only accepts a minus on an empty expression", () => {
        const session = new KeypadSession();
        session.appendOperator("*");
        session.appendOperator("+");
        expect(session.expression).toBe("");
        session.appendOperator("-");
        session.appendChar("4");
        expect(session.expression).toBe("-4");
        expect(session.display).toBe("-4");
    });

    it("ignores a second decimal point in the same number", () => {
        const session = pressAll(new KeypadSession(), ["1", ".", "5", ".", "+", "2", ".", "5"]);
        expect(session.expression).toBe("1.5+2.5");
        expect(session.display).toBe("4");
    });

    it("ignores labels it does not know", () => {
        const session = pressAll(new KeypadSession(), ["1", "x", "(", "2"]);
        expect(session.expression).toBe("12");
    });

    it("shows the formatted result on equals", () => {
        const session = pressAll(new KeypadSession(), ["1", "÷", "3", "="]);
        expect(session.display).toBe("0.333333");
    });

    it("honours the configured fraction digits", () => {
        const session = pressAll(new KeypadSession({ fractionDigits: 2 }), ["2", "÷", "3", "="]);
        expect(session.display).toBe("0.67");
    });

    it("shows Error when the expression cannot be evaluated", () => {
        const session = pressAll(new KeypadSession(), ["5", "÷", "0", "="]);
        expect(session.display).toBe("Error");
    });

    it("shows Error on equals for an incomplete expression", () => {
        const session = pressAll(new KeypadSession(), ["5", "+", "="]);
        expect(session.display).toBe("Error");
    });

    it("does nothing on equals with an empty expression", () => {
        const session = pressAll(new KeypadSession(), ["="]);
        expect(session.display).toBe("0");
    });

    it("recovers after an error once the expression is edited", () => {
        const session = pressAll(new KeypadSession(), ["5", "÷", "0", "=", "⌫", "2", "="]);
        expect(session.expression).toBe("5/2");
        expect(session.display).toBe("2.5");
    });

    it("backspaces down to an empty expression", () => {
        const session = pressAll(new KeypadSession(), ["7", "+", "1", "⌫"]);
        expect(session.expression).toBe("7+");
        expect(session.display).toBe("8");
        pressAll(session, ["⌫", "⌫"]);
        expect(session.expression).toBe("");
        expect(session.display).toBe("0");
    });

    it("clears everything", () => {
        const session = pressAll(new KeypadSession(), ["9", "×", "9", "=", "C"]);
        expect(session.expression).toBe("");
        expect(session.display).toBe("0");
    });

    describe("toggleSign", () => {
        it("negates and restores the trailing number", () => {
            const session = pressAll(new KeypadSession(), ["5", "±"]);
            expect(session.expression).toBe("-5");
            expect(session.display).toBe("-5");
            session.press("±");
            expect(session.expression).toBe("5");
        });

        it("works after an operator", () => {
            const session = pressAll(new KeypadSession(), ["3", "+", "5", "±"]);
            expect(session.expression).toBe("3+-5");
            expect(session.display).toBe("-2");
            session.press("±");
            expect(session.expression).toBe("3+5");
        });

        it("leaves a binary minus in place", () => {
            const session = pressAll(new KeypadSession(), ["3", "−", "5", "±"]);
            expect(session.expression).toBe("3--5");
            expect(session.display).toBe("8");
        });

        it("does nothing without a trailing number", () => {
            const session = pressAll(new KeypadSession(), ["3", "+", "±"]);
            expect(session.expression).toBe("3+");
        });
    });

    describe("percent", () => {
        it("divides the trailing number by 100", () => {
            const session = pressAll(new KeypadSession(), ["5", "0", "%"]);
            expect(session.expression).toBe("0.5");
            expect(session.display).toBe("0.5");
        });

        it("keeps the rest of the expression", () => {
            const session = pressAll(new KeypadSession(), ["2", "0", "0", "+", "1", "0", "%"]);
            expect(session.expression).toBe("200+0.1");
            expect(session.display).toBe("200.1");
        });

        it("carries a unary minus along", () => {
            const session = pressAll(new KeypadSession(), ["5", "±", "%"]);
            expect(session.expression).toBe("-0.05");
        });

        it("does nothing without a number", () => {
            const session = pressAll(new KeypadSession(), ["%", "4", "+", "%"]);
            expect(session.expression).toBe("4+");
        });
    });

    describe("key", () => {
        it("handles keyboard input", () => {
            const session = new KeypadSession();
            for (const key of ["6", "*", "7", "Enter"]) {
                session.key(key);
            }
            expect(session.display).toBe("42");
            session.key("Backspace");
            expect(session.expression).toBe("6*");
            session.key("Escape");
            expect(session.expression).toBe("");
        });

        it("ignores keys outside the keypad", () => {
            const session = new KeypadSession();
            for (const key of ["a", "^", "(", "Tab", "2"]) {
                session.key(key);
            }
            expect(session.expression).toBe("2");
        });
    });

    it("keeps the last preview once the expression grows past the length limit", () => {
        const labels: string[] = [];
        for (let i = 0; i < 600; i++) {
            labels.push("1", "+");
        }
        const session = pressAll(new KeypadSession(), [...labels, "1"]);
        expect(session.expression).toHaveLength(1201);
        expect(session.display).toBe("500");

        session.press("=");
        expect(session.display).toBe("Error");
    });

    it("logs evaluation failures at debug level", () => {
        const lines: string[] = [];
        const logger = pino({ level: "debug" }, { write: (line: string) => { lines.push(line); } });

        pressAll(new KeypadSession({ logger }), ["1", "÷", "0", "="]);

        const records = lines.map(line => JSON.parse(line));
        // "1/" while typing, "1/0" while typing, then "1/0" on equals
        expect(records).toHaveLength(3);
        expect(records[0]).toMatchObject({ level: 20, code: "SYNTAX_ERROR", expression: "1/" });
        expect(records[2]).toMatchObject({
            level: 20,
            code: "NUMERIC_FAULT",
            expression: "1/0",
            msg: "Division by zero",
        });
    });
});
