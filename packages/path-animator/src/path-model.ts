import { DEFAULT_FILL, IPoint, ParsedShape, RGBA, SEGMENT_TYPE, SVG_TAG, SubPath } from '@svg-reveal/svg-parser';
import {
    BoundingBox,
    Mesh,
    Polyline,
    flattenSegment,
    flattenSubPath,
    getBoundingBox,
    getPolylineLength,
    slicePolyline,
    tessellateFill
} from '@svg-reveal/geometry-utils';

import { DEFAULT_DRAW_OPTIONS, DEFAULT_LOAD_OPTIONS } from './constants';
import { GROWTH_ORIGIN, LoadOptions } from './types';

function clamp01(value: number): number {
    return Math.min(Math.max(value, 0), 1);
}

/**
 * One drawable path of a document: its source segments, the tessellated fill,
 * the flattened stroke of every drawing segment and the runtime overlay the
 * animations write to. Fill vertices are rewritten in place from a rest copy.
 */
export default class PathModel {
    #id: string | null;

    #index: number;

    #tag: SVG_TAG;

    #subPaths: SubPath[];

    #fill: RGBA;

    #fillMesh: Mesh;

    #restVertices: Float32Array;

    #bounds: BoundingBox;

    #strokeSegments: Polyline[];

    #strokeLengths: number[];

    public strokeColor: RGBA = [...DEFAULT_DRAW_OPTIONS.lineColor];

    public strokeWidth: number = DEFAULT_DRAW_OPTIONS.lineWidth;

    public showStroke: boolean = false;

    // share of the drawing segments already revealed, 0..1
    public strokeProgress: number = 0;

    public fillOpacity: number = 0;

    private constructor(shape: ParsedShape, options: LoadOptions) {
        const flattenOptions = { resolution: options.resolution, tolerance: options.tolerance };

        this.#id = shape.id;
        this.#index = shape.index;
        this.#tag = shape.tag;
        this.#subPaths = shape.subPaths;
        this.#fill = shape.fill;
        this.#fillMesh = tessellateFill(shape.subPaths, { ...flattenOptions, fillRule: options.fillRule });
        this.#restVertices = this.#fillMesh.vertices.slice();
        this.#strokeSegments = PathModel.flattenStroke(shape.subPaths, flattenOptions);
        this.#strokeLengths = this.#strokeSegments.map(getPolylineLength);
        this.#bounds = getBoundingBox(
            shape.subPaths.reduce<Polyline>(
                (result, subPath) => result.concat(flattenSubPath(subPath, flattenOptions)),
                []
            )
        );
    }

    public get id(): string | null {
        return this.#id;
    }

    public get index(): number {
        return this.#index;
    }

    public get tag(): SVG_TAG {
        return this.#tag;
    }

    public get subPaths(): SubPath[] {
        return this.#subPaths;
    }

    public get fill(): RGBA {
        return this.#fill;
    }

    public get fillMesh(): Mesh {
        return this.#fillMesh;
    }

    public get bounds(): BoundingBox {
        return this.#bounds;
    }

    public get center(): IPoint {
        return { x: this.#bounds.x + this.#bounds.width * 0.5, y: this.#bounds.y + this.#bounds.height * 0.5 };
    }

    public get strokeSegments(): Polyline[] {
        return this.#strokeSegments;
    }

    public get segmentCount(): number {
        return this.#strokeSegments.length;
    }

    public get fillColor(): RGBA {
        return [this.#fill[0], this.#fill[1], this.#fill[2], this.#fill[3] * clamp01(this.fillOpacity)];
    }

    /**
     * Revealed part of the stroke: whole segments first, then the leading share of
     * the next one by arc length.
     */
    public getStrokePolylines(fraction: number = this.strokeProgress): Polyline[] {
        const position: number = clamp01(fraction) * this.segmentCount;
        const complete: number = Math.floor(position);
        const result: Polyline[] = this.#strokeSegments.slice(0, complete);

        if (complete < this.segmentCount && position > complete) {
            result.push(
                slicePolyline(this.#strokeSegments[complete], (position - complete) * this.#strokeLengths[complete])
            );
        }

        return result;
    }

    /**
     * Scales the fill towards the growth base line: `base + (v - base) * progress`
     * on the growth axis. `none` keeps the geometry and fades the fill in instead.
     */
    public applyGrowth(origin: GROWTH_ORIGIN, progress: number): void {
        const vertices: Float32Array = this.#fillMesh.vertices;
        const rest: Float32Array = this.#restVertices;
        const { x, y, width, height } = this.#bounds;
        let offset: number = 0;
        let base: number = 0;
        let i: number = 0;

        switch (origin) {
            case GROWTH_ORIGIN.LEFT:
                base = x;
                break;
            case GROWTH_ORIGIN.RIGHT:
                base = x + width;
                break;
            case GROWTH_ORIGIN.CENTER_X:
                base = x + width * 0.5;
                break;
            case GROWTH_ORIGIN.TOP:
                offset = 1;
                base = y;
                break;
            case GROWTH_ORIGIN.BOTTOM:
                offset = 1;
                base = y + height;
                break;
            case GROWTH_ORIGIN.CENTER_Y:
                offset = 1;
                base = y + height * 0.5;
                break;
            case GROWTH_ORIGIN.NONE:
            default:
                this.resetGeometry();
                this.fillOpacity = clamp01(progress);

                return;
        }

        vertices.set(rest);

        for (i = offset; i < vertices.length; i = i + 2) {
            vertices[i] = base + (rest[i] - base) * progress;
        }

        this.fillOpacity = 1;
    }

    // moves the fill so its bbox centre lands on `center`, turned by `angle` degrees
    public applyPlacement(center: IPoint, angle: number = 0): void {
        const vertices: Float32Array = this.#fillMesh.vertices;
        const rest: Float32Array = this.#restVertices;
        const origin: IPoint = this.center;
        const radians: number = (angle * Math.PI) / 180;
        const cos: number = Math.cos(radians);
        const sin: number = Math.sin(radians);
        let dx: number = 0;
        let dy: number = 0;
        let i: number = 0;

        for (i = 0; i + 1 < vertices.length; i = i + 2) {
            dx = rest[i] - origin.x;
            dy = rest[i + 1] - origin.y;
            vertices[i] = center.x + cos * dx - sin * dy;
            vertices[i + 1] = center.y + sin * dx + cos * dy;
        }
    }

    public resetGeometry(): void {
        this.#fillMesh.vertices.set(this.#restVertices);
    }

    public resetOverlay(): void {
        this.resetGeometry();
        this.showStroke = false;
        this.strokeProgress = 0;
        this.fillOpacity = 0;
    }

    private static flattenStroke(subPaths: SubPath[], options: { resolution: number; tolerance?: number }): Polyline[] {
        const result: Polyline[] = [];

        subPaths.forEach(subPath =>
            subPath.segments.forEach(segment => {
                if (segment.type !== SEGMENT_TYPE.MOVE_TO) {
                    result.push([segment.from.x, segment.from.y, ...flattenSegment(segment, options)]);
                }
            })
        );

        return result;
    }

    public static create(shape: ParsedShape, options: Partial<LoadOptions> = {}): PathModel {
        return new PathModel(shape, { ...DEFAULT_LOAD_OPTIONS, ...options });
    }

    public static fromPath(definition: SubPath[], id: string | null = null, fill: RGBA = DEFAULT_FILL): PathModel {
        return PathModel.create({ id, index: 0, tag: SVG_TAG.PATH, subPaths: definition, fill });
    }
}
