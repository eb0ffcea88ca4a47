import { INode } from 'svgson';

import { ParseOptions, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class EllipseBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        this.writeEllipse(
            this.getFloatAttribute('cx'),
            this.getFloatAttribute('cy'),
            this.getFloatAttribute('rx'),
            this.getFloatAttribute('ry')
        );

        return super.getResult();
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new EllipseBuilder(element, options);
    }
}
