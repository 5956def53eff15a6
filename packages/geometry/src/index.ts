export { Vector } from "./vector.js";
export { FLOAT_LIMIT, nearlyEqual } from "./scalar.js";
