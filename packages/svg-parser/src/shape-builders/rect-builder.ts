import { INode } from 'svgson';

import { getAttribute } from '../helpers';
import { ParseOptions, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class RectBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        const x: number = this.getFloatAttribute('x');
        const y: number = this.getFloatAttribute('y');
        const width: number = this.getFloatAttribute('width');
        const height: number = this.getFloatAttribute('height');

        if (width <= 0 || height <= 0) {
            return super.getResult();
        }

        const [rx, ry] = this.getCornerRadii(width, height);

        if (rx === 0 || ry === 0) {
            this.writer
                .moveTo({ x, y })
                .lineTo({ x: x + width, y })
                .lineTo({ x: x + width, y: y + height })
                .lineTo({ x, y: y + height })
                .close();

            return super.getResult();
        }

        this.writer
            .moveTo({ x: x + rx, y })
            .lineTo({ x: x + width - rx, y })
            .arcTo(rx, ry, 0, false, true, { x: x + width, y: y + ry })
            .lineTo({ x: x + width, y: y + height - ry })
            .arcTo(rx, ry, 0, false, true, { x: x + width - rx, y: y + height })
            .lineTo({ x: x + rx, y: y + height })
            .arcTo(rx, ry, 0, false, true, { x, y: y + height - ry })
            .lineTo({ x, y: y + ry })
            .arcTo(rx, ry, 0, false, true, { x: x + rx, y })
            .close();

        return super.getResult();
    }

    // a missing radius takes the other one, both are clamped to half the side
    private getCornerRadii(width: number, height: number): [number, number] {
        const hasRx: boolean = getAttribute(this.element, 'rx') !== null;
        const hasRy: boolean = getAttribute(this.element, 'ry') !== null;
        let rx: number = Math.max(this.getFloatAttribute('rx'), 0);
        let ry: number = Math.max(this.getFloatAttribute('ry'), 0);

        if (hasRx && !hasRy) {
            ry = rx;
        } else if (hasRy && !hasRx) {
            rx = ry;
        }

        return [Math.min(rx, 0.5 * width), Math.min(ry, 0.5 * height)];
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new RectBuilder(element, options);
    }
}
