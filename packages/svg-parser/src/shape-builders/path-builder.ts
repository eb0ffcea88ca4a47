import { INode } from 'svgson';

import { getAttribute } from '../helpers';
import PathParser from '../path-parser/path-parser';
import { ParseOptions, SubPath } from '../types';
import BasicShapeBuilder from './basic-shape-builder';

export default class PathBuilder extends BasicShapeBuilder {
    public getResult(): SubPath[] {
        return PathParser.parse(getAttribute(this.element, 'd') ?? '', this.options);
    }

    public static create(element: INode, options: ParseOptions): BasicShapeBuilder {
        return new PathBuilder(element, options);
    }
}
