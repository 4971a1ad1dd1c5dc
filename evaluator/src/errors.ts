export type EvaluationErrorCode =
    | 'EMPTY_INPUT'
    | 'SYNTAX_ERROR'
    | 'DISALLOWED_OPERATOR'
    | 'NUMERIC_FAULT';

// Базовая ошибка вычисления; startIdx/endIdx: смещения в исходной строке
export class EvaluationError extends Error {
    constructor(
        message: string,
        public readonly code: EvaluationErrorCode,
        public readonly startIdx?: number,
        public readonly endIdx?: number
    ) {
        super(message);
        this.name = 'EvaluationError';
    }
}

export class EmptyInputError extends EvaluationError {
    constructor() {
        super('Expression is empty', 'EMPTY_INPUT');
        this.name = 'EmptyInputError';
    }
}

export class SyntaxError extends EvaluationError {
    constructor(message: string) {
        super(message, 'SYNTAX_ERROR');
        this.name = 'SyntaxError';
    }
}

export class DisallowedOperatorError extends EvaluationError {
    constructor(message: string, startIdx?: number, endIdx?: number) {
        super(message, 'DISALLOWED_OPERATOR', startIdx, endIdx);
        this.name = 'DisallowedOperatorError';
    }
}

export class NumericFaultError extends EvaluationError {
    constructor(message: string) {
        super(message, 'NUMERIC_FAULT');
        this.name = 'NumericFaultError';
    }
}

// Разбор и свёртка рекурсивны: переполнение стека превращаем в обычную ошибку разбора.
export function withStackGuard<T>(work: () => T): T {
    try {
        return work();
    } catch (error) {
        if (error instanceof RangeError) {
            throw new SyntaxError('Expression is nested too deeply');
        }
        throw error;
    }
}
