export interface ViewerConfig {
  frameMs: number;
  // Drag distance, as a fraction of the sub-cell width, times this many radians.
  mouseSpeed: number;
  scrollStep: number; // fraction of the model diagonal per wheel notch
  panStep: number; // fraction of the model diagonal per pan unit
  autoRotateSpeed: number; // radians per frame
  initialYaw: number;
  initialPitch: number;
  distanceFactor: number; // initial distance = diagonal × factor
  minZoom: number;
  maxZoom: number;
  fov: number;
  near: number; // upper bound; small models get a nearer plane
}

export const defaultViewerConfig: ViewerConfig = {
  frameMs: 33,
  mouseSpeed: 30,
  scrollStep: 0.03,
  panStep: 0.1,
  autoRotateSpeed: 0.002,
  initialYaw: 0.3,
  initialPitch: 0.2,
  distanceFactor: 1.2,
  minZoom: 0.05,
  maxZoom: 10,
  fov: 1.7,
  near: 0.1,
};

export function viewerConfig(overrides: Partial<ViewerConfig> = {}): ViewerConfig {
  return { ...defaultViewerConfig, ...overrides };
}
