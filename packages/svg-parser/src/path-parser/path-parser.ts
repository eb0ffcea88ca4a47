import { parseSVG, makeAbsolute, Command, CommandMadeAbsolute } from 'svg-path-parser';

import { DEFAULT_ARC_TOLERANCE } from '../constants';
import { MalformedPathError } from '../errors';
import { IPoint, ParseOptions, SEGMENT_TYPE, Segment, SubPath } from '../types';
import PathWriter from './path-writer';

export default class PathParser {
    #definition: string;

    #writer: PathWriter;

    protected constructor(definition: string, arcTolerance: number) {
        this.#definition = definition;
        this.#writer = new PathWriter(arcTolerance);
    }

    public getResult(): SubPath[] {
        const segments: CommandMadeAbsolute[] = this.tokenize();
        const segmentCount: number = segments.length;
        let i: number = 0;

        for (i = 0; i < segmentCount; ++i) {
            this.apply(segments[i]);
        }

        return this.#writer.getResult();
    }

    private tokenize(): CommandMadeAbsolute[] {
        let rawSegments: Command[];

        if (this.#definition.trim() === '') {
            return [];
        }

        try {
            rawSegments = parseSVG(this.#definition);
        } catch (error) {
            throw new MalformedPathError(this.#definition, error instanceof Error ? error.message : String(error));
        }

        return makeAbsolute(rawSegments);
    }

    private apply(segment: CommandMadeAbsolute): void {
        const writer: PathWriter = this.#writer;

        switch (segment.code) {
            case 'M':
                writer.moveTo({ x: segment.x, y: segment.y });
                break;
            case 'L':
                writer.lineTo({ x: segment.x, y: segment.y });
                break;
            case 'H':
                writer.lineTo({ x: segment.x, y: writer.point.y });
                break;
            case 'V':
                writer.lineTo({ x: writer.point.x, y: segment.y });
                break;
            case 'C':
                writer.cubicTo(
                    { x: segment.x1, y: segment.y1 },
                    { x: segment.x2, y: segment.y2 },
                    { x: segment.x, y: segment.y }
                );
                break;
            case 'S':
                writer.cubicTo(this.reflectCubicControl(), { x: segment.x2, y: segment.y2 }, { x: segment.x, y: segment.y });
                break;
            case 'Q':
                writer.quadraticTo({ x: segment.x1, y: segment.y1 }, { x: segment.x, y: segment.y });
                break;
            case 'T':
                writer.quadraticTo(this.reflectQuadraticControl(), { x: segment.x, y: segment.y });
                break;
            case 'A':
                writer.arcTo(segment.rx, segment.ry, segment.xAxisRotation, segment.largeArc, segment.sweep, {
                    x: segment.x,
                    y: segment.y
                });
                break;
            case 'Z':
                writer.close();
                break;
            default:
        }
    }

    // implicit control point: reflection of the previous cubic's second control point
    private reflectCubicControl(): IPoint {
        const current: IPoint = this.#writer.point;
        const previous: Segment | null = this.#writer.lastSegment;

        if (previous === null || previous.type !== SEGMENT_TYPE.CUBIC) {
            return current;
        }

        return { x: 2 * current.x - previous.control2.x, y: 2 * current.y - previous.control2.y };
    }

    private reflectQuadraticControl(): IPoint {
        const current: IPoint = this.#writer.point;
        const previous: Segment | null = this.#writer.lastSegment;

        if (previous === null || previous.type !== SEGMENT_TYPE.QUADRATIC) {
            return current;
        }

        return { x: 2 * current.x - previous.control.x, y: 2 * current.y - previous.control.y };
    }

    public static parse(definition: string, options: Partial<ParseOptions> = {}): SubPath[] {
        const { arcTolerance = DEFAULT_ARC_TOLERANCE } = options;

        return new PathParser(definition, arcTolerance).getResult();
    }
}

export function parsePath(definition: string, options: Partial<ParseOptions> = {}): SubPath[] {
    return PathParser.parse(definition, options);
}
