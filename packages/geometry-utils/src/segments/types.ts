import { IPoint } from '@svg-reveal/svg-parser';

export interface IBasicSegmentData {
    point1: IPoint;
    point2: IPoint;
}

export interface IQuadraticSegmentData extends IBasicSegmentData {
    control: IPoint;
}

export interface ICubicSegmentData extends IBasicSegmentData {
    control1: IPoint;
    control2: IPoint;
}
