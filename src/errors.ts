export class MenuError extends Error {
    public readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = 'MenuError';
        this.code = code;
    }
}

/** A slot source that does not contain the divider exactly twice. */
export class FormatError extends MenuError {
    public readonly source: string;

    constructor(source: string, dividerCount: number) {
        super(`Slot "${source}" must contain the divider exactly twice, found ${dividerCount}`, 'E_FORMAT');
        this.name = 'FormatError';
        this.source = source;
    }
}

export class NotFoundError extends MenuError {
    public readonly path: string;

    constructor(message: string, path: string) {
        super(message, 'E_NOT_FOUND');
        this.name = 'NotFoundError';
        this.path = path;
    }
}

export class BoundaryError extends MenuError {
    constructor(message: string) {
        super(message, 'E_BOUNDARY');
        this.name = 'BoundaryError';
    }
}

export class ConfigurationError extends MenuError {
    constructor(message: string) {
        super(message, 'E_CONFIG');
        this.name = 'ConfigurationError';
    }
}
