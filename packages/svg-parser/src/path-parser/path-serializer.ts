import { PATH_COMMAND, SEGMENT_TYPE, Segment, SubPath } from '../types';

function serializeSegment(segment: Segment): string {
    let code: PATH_COMMAND;
    let paramValues: number[];

    switch (segment.type) {
        case SEGMENT_TYPE.MOVE_TO:
            code = PATH_COMMAND.M;
            paramValues = [segment.to.x, segment.to.y];
            break;
        case SEGMENT_TYPE.LINE_TO:
            code = PATH_COMMAND.L;
            paramValues = [segment.to.x, segment.to.y];
            break;
        case SEGMENT_TYPE.CUBIC:
            code = PATH_COMMAND.C;
            paramValues = [
                segment.control1.x,
                segment.control1.y,
                segment.control2.x,
                segment.control2.y,
                segment.to.x,
                segment.to.y
            ];
            break;
        case SEGMENT_TYPE.QUADRATIC:
            code = PATH_COMMAND.Q;
            paramValues = [segment.control.x, segment.control.y, segment.to.x, segment.to.y];
            break;
        case SEGMENT_TYPE.ARC:
            code = PATH_COMMAND.A;
            paramValues = [
                segment.rx,
                segment.ry,
                segment.rotation,
                segment.largeArc ? 1 : 0,
                segment.sweep ? 1 : 0,
                segment.to.x,
                segment.to.y
            ];
            break;
        case SEGMENT_TYPE.CLOSE:
        default:
            code = PATH_COMMAND.Z;
            paramValues = [];
    }

    return `${code}${paramValues.join(',')}`;
}

// absolute commands only, so parsing the result gives back the same segments
export default function serializePath(subPaths: SubPath[]): string {
    return subPaths
        .map(subPath => subPath.segments.map(serializeSegment).join(' '))
        .join(' ');
}
