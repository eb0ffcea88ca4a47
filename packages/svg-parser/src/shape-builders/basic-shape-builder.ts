import { INode } from 'svgson';

import { getFloatAttribute } from '../helpers';
import PathWriter from '../path-parser/path-writer';
import { ParseOptions, SubPath } from '../types';

export default class BasicShapeBuilder {
    #element: INode;

    #writer: PathWriter;

    #options: ParseOptions;

    protected constructor(element: INode, options: ParseOptions) {
        this.#element = element;
        this.#options = options;
        this.#writer = new PathWriter(options.arcTolerance);
    }

    protected get element(): INode {
        return this.#element;
    }

    protected get writer(): PathWriter {
        return this.#writer;
    }

    protected get options(): ParseOptions {
        return this.#options;
    }

    protected getFloatAttribute(key: string): number {
        return getFloatAttribute(this.#element, key);
    }

    // four quarter arcs starting at the rightmost point, clockwise on screen
    protected writeEllipse(cx: number, cy: number, rx: number, ry: number): void {
        if (rx <= 0 || ry <= 0) {
            return;
        }

        this.writer
            .moveTo({ x: cx + rx, y: cy })
            .arcTo(rx, ry, 0, false, true, { x: cx, y: cy + ry })
            .arcTo(rx, ry, 0, false, true, { x: cx - rx, y: cy })
            .arcTo(rx, ry, 0, false, true, { x: cx, y: cy - ry })
            .arcTo(rx, ry, 0, false, true, { x: cx + rx, y: cy })
            .close();
    }

    public getResult(): SubPath[] {
        return this.#writer.getResult();
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new BasicShapeBuilder(element, options);
    }
}
