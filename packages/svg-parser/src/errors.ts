export class SvgRevealError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = 'SvgRevealError';
    }
}

export class MalformedPathError extends SvgRevealError {
    public readonly definition: string;

    public constructor(definition: string, reason: string) {
        super(`Malformed path data "${MalformedPathError.shorten(definition)}": ${reason}`);
        this.name = 'MalformedPathError';
        this.definition = definition;
    }

    private static shorten(definition: string): string {
        return definition.length > 48 ? `${definition.slice(0, 45)}...` : definition;
    }
}

export class UnparseableColorError extends SvgRevealError {
    public readonly value: string;

    public constructor(value: string) {
        super(`Unsupported color "${value}", only hex colors are accepted`);
        this.name = 'UnparseableColorError';
        this.value = value;
    }
}

export class InvalidDimensionError extends SvgRevealError {
    public readonly attribute: string;

    public readonly value: string;

    public constructor(attribute: string, value: string) {
        super(`Invalid SVG ${attribute} "${value}"`);
        this.name = 'InvalidDimensionError';
        this.attribute = attribute;
        this.value = value;
    }
}

export class DocumentLoadError extends SvgRevealError {
    public constructor(message: string) {
        super(message);
        this.name = 'DocumentLoadError';
    }
}
