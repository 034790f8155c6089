export { compileCurve, evaluateCurve, sampleCurve } from './curve';
export { selectSegment, applySegment, segmentBetween, sortControlPoints, validateControlPoints } from './helpers';
export type { ControlPoint, Segment, DutyBounds, CurveSample } from './types';
