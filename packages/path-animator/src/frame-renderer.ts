import { RGBA, ViewBox } from '@svg-reveal/svg-parser';
import { Polyline, buildStrokeMesh } from '@svg-reveal/geometry-utils';

import PathModel from './path-model';
import { RenderSurface } from './types';

/**
 * Maps document coordinates onto the surface viewport and submits one complete
 * frame. The surface is y-up unless `flipY` is turned off.
 */
export default class FrameRenderer {
    #surface: RenderSurface;

    #flipY: boolean;

    public constructor(surface: RenderSurface, flipY: boolean = true) {
        this.#surface = surface;
        this.#flipY = flipY;
    }

    public mapPoints(points: ArrayLike<number>, viewBox: ViewBox): Float32Array {
        const { x, y, width, height } = this.#surface.viewport;
        const result: Float32Array = new Float32Array(points.length);
        const scaleX: number = width / viewBox.width;
        const scaleY: number = height / viewBox.height;
        let i: number = 0;

        for (i = 0; i + 1 < points.length; i = i + 2) {
            result[i] = x + scaleX * (points[i] - viewBox.x);
            result[i + 1] = this.#flipY
                ? y + scaleY * (viewBox.y + viewBox.height - points[i + 1])
                : y + scaleY * (points[i + 1] - viewBox.y);
        }

        return result;
    }

    public render(models: PathModel[], viewBox: ViewBox): void {
        const surface: RenderSurface = this.#surface;

        surface.clear();
        models.forEach(model => {
            this.renderFill(model, viewBox);
            this.renderStroke(model, viewBox);
        });

        if (surface.present) {
            surface.present();
        }
    }

    private renderFill(model: PathModel, viewBox: ViewBox): void {
        const { vertices, indices } = model.fillMesh;
        const color: RGBA = model.fillColor;

        if (indices.length === 0 || color[3] <= 0) {
            return;
        }

        this.#surface.submit(this.mapPoints(vertices, viewBox), indices, color);
    }

    private renderStroke(model: PathModel, viewBox: ViewBox): void {
        if (!model.showStroke || model.strokeProgress <= 0 || model.strokeColor[3] <= 0) {
            return;
        }

        const polylines: Polyline[] = model
            .getStrokePolylines()
            .map(polyline => Array.from(this.mapPoints(polyline, viewBox)));
        const { vertices, indices } = buildStrokeMesh(polylines, model.strokeWidth);

        if (indices.length !== 0) {
            this.#surface.submit(vertices, indices, model.strokeColor);
        }
    }
}
