import { ROTATION_STEP } from './constants';
import PathFollower from './path-follower';
import PathModel from './path-model';
import { GROWTH_ORIGIN, PhaseEffect } from './types';

export function createStrokeEffect(model: PathModel): PhaseEffect {
    return progress => {
        model.showStroke = true;
        model.strokeProgress = progress;
    };
}

export function createFillEffect(model: PathModel): PhaseEffect {
    return progress => {
        model.fillOpacity = progress;
    };
}

export function createGrowthEffect(model: PathModel, origin: GROWTH_ORIGIN): PhaseEffect {
    return progress => model.applyGrowth(origin, progress);
}

export function createFollowEffect(model: PathModel, follower: PathFollower, rotate: boolean): PhaseEffect {
    return progress => {
        model.applyPlacement(follower.pointAt(progress), rotate ? follower.angleAt(progress, ROTATION_STEP) : 0);
        model.fillOpacity = 1;
    };
}
