export { kindOf, type Kind } from '@luma/core';
export { CastError } from './error.js';
export { type CastResult, cast } from './cast.js';
export { type EvalResult, type EvaluatorOptions, evaluate } from './evaluate.js';
export { getType, kindFromName, kindFromValue } from './introspect.js';
