export * from "./types.js";
export {
  createCamera,
  orbit,
  panBy,
  zoomBy,
  resetCamera,
  cameraEquals,
  viewMatrix,
  eyePosition,
  wrapYaw,
  PITCH_LIMIT,
  type Camera,
  type CameraOptions,
} from "./camera.js";
export {
  createViewport,
  createProjection,
  projectModel,
  subcellOf,
  toScreen,
  type ProjectOptions,
  type Projection,
  type ProjectedVertices,
} from "./projector.js";
export {
  createSubcellBuffer,
  clearSubcellBuffer,
  occupiedCount,
  rasterize,
  rasterizeRegion,
  type RasterizeOptions,
  type SubcellBuffer,
} from "./rasterizer.js";
export {
  GRADIENTS,
  DEFAULT_GRADIENT,
  gradientColor,
  interpolatePalette,
  nextGradient,
  isGradientName,
  parseGradientName,
  type GradientName,
} from "./gradients.js";
export { colorize, colorParameter, coveredDepthRange, type ColorizeOptions, type DepthRange } from "./colorizer.js";
export {
  brailleGlyph,
  centerText,
  diffFrames,
  emptyFrame,
  encodeFrame,
  encodeUpdates,
  occupiedCells,
  packGlyphs,
} from "./glyphs.js";
export { renderFrame, type RenderSettings } from "./pipeline.js";
