import { SvgRevealError } from '@svg-reveal/svg-parser';

export class UnresolvedAnimationTargetError extends SvgRevealError {
    public readonly id: string;

    public constructor(id: string) {
        super(`No path with id "${id}" in the document`);
        this.name = 'UnresolvedAnimationTargetError';
        this.id = id;
    }
}

export class ConfigurationError extends SvgRevealError {
    public readonly option: string;

    public constructor(option: string, message: string) {
        super(`Invalid option "${option}": ${message}`);
        this.name = 'ConfigurationError';
        this.option = option;
    }
}

export class InvalidAnimationSpecError extends ConfigurationError {
    public constructor(option: string) {
        super(option, 'expected an animation spec object');
        this.name = 'InvalidAnimationSpecError';
    }
}
