export class CaptureError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'CaptureError';
    }
}

/** A numeric or enumerated parameter is out of range. */
export class ParameterError extends CaptureError {
    constructor(public readonly field: string, message: string) {
        super(`Invalid ${field}: ${message}`);
        this.name = 'ParameterError';
    }
}

export class TimeFormatError extends CaptureError {
    static readonly EXPECTED_FORMAT = 'yyyy-MM-dd HH:mm:ss';

    constructor(public readonly row: number, public readonly value: string) {
        super(
            `Datetime parsing failed at row ${row}: "${value}" is not a timestamp.\n` +
            `Hint: Ensure the datetime format in your file matches the pattern '${TimeFormatError.EXPECTED_FORMAT}'.`
        );
        this.name = 'TimeFormatError';
    }
}

export class MissingColumnError extends CaptureError {
    constructor(public readonly column: string, available: string[]) {
        super(`Missing required column "${column}" (found: ${available.join(', ') || 'none'})`);
        this.name = 'MissingColumnError';
    }
}

export class NoDataError extends CaptureError {
    constructor(message: string = 'No records to analyze after filtering') {
        super(message);
        this.name = 'NoDataError';
    }
}
