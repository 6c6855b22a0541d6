export { classificationMetrics, confusionMatrix, confusionMatrixFromCounts } from './confusion.js';
export { areaUnderCurve, buildCurve, operatingPoint } from './curve.js';
