export enum FILL_RULE {
    NON_ZERO = 'nonzero',
    EVEN_ODD = 'evenodd'
}

// flat [x0, y0, x1, y1, ...] list
export type Polyline = number[];

export interface Mesh {
    vertices: Float32Array;
    indices: Uint32Array;
}

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export type FlattenOptions = {
    resolution: number;
    // switches to adaptive subdivision when set
    tolerance?: number;
};

export type FillOptions = FlattenOptions & {
    fillRule: FILL_RULE;
};

export interface ContourGroup {
    outer: Polyline;
    holes: Polyline[];
}
