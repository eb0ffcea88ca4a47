import { INode, parseSync } from 'svgson';

import { resolveFill, FillResolution } from './color';
import { DEFAULT_DOCUMENT_OPTIONS, DEFAULT_VIEW_BOX } from './constants';
import { DocumentLoadError, InvalidDimensionError, SvgRevealError } from './errors';
import { getAttribute } from './helpers';
import SHAPE_BUILDERS from './shape-builders';
import {
    DocumentOptions,
    LoadIssue,
    PATH_ERROR_POLICY,
    ParsedDocument,
    ParsedShape,
    SVG_TAG,
    SubPath,
    ViewBox
} from './types';

export type WarningLogger = Pick<Console, 'warn'>;

// subtrees that never render on their own
const SKIPPED_TAGS: SVG_TAG[] = [
    SVG_TAG.DEFS,
    SVG_TAG.CLIP_PATH,
    SVG_TAG.MASK,
    SVG_TAG.SYMBOL,
    SVG_TAG.PATTERN,
    SVG_TAG.MARKER
];

type ViewBoxResolution = {
    viewBox: ViewBox;
    error: InvalidDimensionError | null;
};

function parseDimension(value: string | null): number {
    return value === null ? NaN : Number(value.trim().replace(/px$/, ''));
}

function isValidSize(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

export default class SVGParser {
    #options: DocumentOptions;

    #logger: WarningLogger;

    #issues: LoadIssue[] = [];

    public constructor(options: Partial<DocumentOptions> = {}, logger: WarningLogger = console) {
        this.#options = { ...DEFAULT_DOCUMENT_OPTIONS, ...options };
        this.#logger = logger;
    }

    /**
     * Loads every supported shape of the document in document order. Recoverable
     * problems end up in `issues`; unreadable markup throws `DocumentLoadError`.
     */
    public parse(svgText: string): ParsedDocument {
        const root: INode = SVGParser.getRoot(svgText);
        const elements: INode[] = [];
        const shapes: ParsedShape[] = [];
        let i: number = 0;
        let shape: ParsedShape | null = null;

        this.#issues = [];

        const { viewBox, error } = SVGParser.resolveViewBox(root);

        if (error !== null) {
            this.report(-1, null, error);
        }

        SVGParser.collectShapes(root, elements);

        for (i = 0; i < elements.length; ++i) {
            shape = this.parseShape(elements[i], i);

            if (shape !== null) {
                shapes.push(shape);
            }
        }

        if (elements.length !== 0 && shapes.length === 0) {
            throw new DocumentLoadError(`None of the ${elements.length} shapes in the document could be loaded`);
        }

        return { viewBox, shapes, issues: this.#issues };
    }

    private parseShape(element: INode, index: number): ParsedShape | null {
        const tag: SVG_TAG = element.name as SVG_TAG;
        const id: string | null = getAttribute(element, 'id');
        const builder = SHAPE_BUILDERS.get(tag);
        let subPaths: SubPath[] = [];

        if (builder === undefined) {
            return null;
        }

        try {
            subPaths = builder.create(element, this.#options).getResult();
        } catch (error) {
            if (!(error instanceof SvgRevealError) || this.#options.onPathError === PATH_ERROR_POLICY.ABORT) {
                throw error;
            }

            this.report(index, id, error);

            return null;
        }

        const fill: FillResolution = resolveFill(getAttribute(element, 'fill'));

        if (fill.error !== null) {
            this.report(index, id, fill.error);
        }

        return { id, index, tag, subPaths, fill: fill.color };
    }

    private report(index: number, id: string | null, error: SvgRevealError): void {
        this.#issues.push({ index, id, error });
        this.#logger.warn(error.message);
    }

    private static getRoot(svgText: string): INode {
        let svg: INode;

        try {
            svg = parseSync(svgText);
        } catch (error) {
            throw new DocumentLoadError(
                `Failed to parse SVG string: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        if ((svg.name as SVG_TAG) === SVG_TAG.SVG) {
            return svg;
        }

        // svg document may start with comments or text nodes
        const root: INode | undefined = svg.children.find(child => (child.name as SVG_TAG) === SVG_TAG.SVG);

        if (root === undefined) {
            throw new DocumentLoadError('Document has no <svg> root element');
        }

        return root;
    }

    private static collectShapes(element: INode, result: INode[]): void {
        const children: INode[] = element.children;
        const childCount: number = children.length;
        let i: number = 0;
        let child: INode;

        for (i = 0; i < childCount; ++i) {
            child = children[i];

            if (child.type !== 'element' || SKIPPED_TAGS.includes(child.name as SVG_TAG)) {
                continue;
            }

            if (SHAPE_BUILDERS.has(child.name as SVG_TAG)) {
                result.push(child);
            } else {
                SVGParser.collectShapes(child, result);
            }
        }
    }

    private static resolveViewBox(root: INode): ViewBoxResolution {
        const viewBox: string | null = getAttribute(root, 'viewBox');

        if (viewBox !== null) {
            const values: number[] = viewBox.trim().split(/[\s,]+/).map(Number);
            const [x, y, width, height] = values;

            if (values.length !== 4 || !Number.isFinite(x) || !Number.isFinite(y) || !isValidSize(width) || !isValidSize(height)) {
                return { viewBox: { ...DEFAULT_VIEW_BOX }, error: new InvalidDimensionError('viewBox', viewBox) };
            }

            return { viewBox: { x, y, width, height }, error: null };
        }

        const widthValue: string | null = getAttribute(root, 'width');
        const heightValue: string | null = getAttribute(root, 'height');

        if (widthValue === null && heightValue === null) {
            return { viewBox: { ...DEFAULT_VIEW_BOX }, error: null };
        }

        const width: number = parseDimension(widthValue);
        const height: number = parseDimension(heightValue);

        if (!isValidSize(width)) {
            return { viewBox: { ...DEFAULT_VIEW_BOX }, error: new InvalidDimensionError('width', widthValue ?? '') };
        }

        if (!isValidSize(height)) {
            return { viewBox: { ...DEFAULT_VIEW_BOX }, error: new InvalidDimensionError('height', heightValue ?? '') };
        }

        return { viewBox: { x: 0, y: 0, width, height }, error: null };
    }

    public static parse(svgText: string, options: Partial<DocumentOptions> = {}, logger?: WarningLogger): ParsedDocument {
        return new SVGParser(options, logger).parse(svgText);
    }
}
