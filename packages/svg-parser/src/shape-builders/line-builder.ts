import { INode } from 'svgson';

import { ParseOptions, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class LineBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        this.writer
            .moveTo({ x: this.getFloatAttribute('x1'), y: this.getFloatAttribute('y1') })
            .lineTo({ x: this.getFloatAttribute('x2'), y: this.getFloatAttribute('y2') });

        return super.getResult();
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new LineBuilder(element, options);
    }
}
