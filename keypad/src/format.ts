import { NumericFaultError } from "../../evaluator";

export const DEFAULT_FRACTION_DIGITS = 6;

// Целые значения печатаются без точки и без экспоненты (1e20 -> "100000000000000000000").
export function formatResult(value: number, fractionDigits: number = DEFAULT_FRACTION_DIGITS): string {
    if (!Number.isFinite(value)) {
        throw new NumericFaultError(`Cannot display ${value}`);
    }

    if (Number.isInteger(value)) {
        return BigInt(value).toString();
    }

    let text = value.toFixed(fractionDigits);
    if (text.includes(".")) {
        text = text.replace(/0+$/, "").replace(/\.$/, "");
    }
    return text === "-0" ? "0" : text;
}
