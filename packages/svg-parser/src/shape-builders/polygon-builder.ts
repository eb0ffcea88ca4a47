import { INode } from 'svgson';

import { getAttribute, parsePointList } from '../helpers';
import { IPoint, ParseOptions, SVG_TAG, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class PolygonBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        const points: IPoint[] = parsePointList(getAttribute(this.element, 'points') ?? '');
        const pointCount: number = points.length;
        let i: number = 0;

        if (pointCount === 0) {
            return super.getResult();
        }

        this.writer.moveTo(points[0]);

        for (i = 1; i < pointCount; ++i) {
            this.writer.lineTo(points[i]);
        }

        // polylines stay open
        if ((this.element.name as SVG_TAG) === SVG_TAG.POLYGON) {
            this.writer.close();
        }

        return super.getResult();
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new PolygonBuilder(element, options);
    }
}
