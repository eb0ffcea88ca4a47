import { INode } from 'svgson';

import { ParseOptions, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class CircleBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        const radius: number = this.getFloatAttribute('r');

        this.writeEllipse(this.getFloatAttribute('cx'), this.getFloatAttribute('cy'), radius, radius);

        return super.getResult();
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new CircleBuilder(element, options);
    }
}
