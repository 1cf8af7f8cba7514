export { Grid2d, gridIndex, gridPosition } from "./grid2d.js";
export { Scene } from "./scene.js";
