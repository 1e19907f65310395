export {
  EDGE_MODES,
  type EdgeMode,
  euclideanMod,
  mirrorIndex,
  resolveCoord,
} from "./boundary.js";
export {
  DIFF_AXES,
  type DiffAxis,
  type DifferentialConfig,
  DifferentialExtractor,
  extractDifferential,
} from "./differential.js";
export {
  DISTANCE_METRIC_KINDS,
  type DistanceMetric,
  type DistanceMetricKind,
  distance,
  MIN_MINKOWSKI_EXPONENT,
  resolveMetric,
} from "./distance.js";
export { ConfigurationError } from "./errors.js";
export { HashSalt, hash3, hashU32, rand01, saltedRand01 } from "./hash.js";
export {
  type BitDepth,
  encodePng,
  loadImage,
  savePng,
} from "./image-io.js";
export {
  CHANNELS,
  createPixelBuffer,
  finiteFloat32,
  fromIntegerChannels,
  type Pixel,
  type PixelBuffer,
  readPixel,
  toUint8Channels,
  toUint16Channels,
  writePixel,
} from "./pixel-buffer.js";
export {
  bandedBackend,
  type PixelKernel,
  type RenderBackend,
  renderRows,
  serialBackend,
} from "./render.js";
export {
  applyResponse,
  clamp01,
  createRemap,
  mirror01,
  RESPONSE_MODES,
  type ResponseMode,
  remapValue,
  softClamp01,
  wrap01,
} from "./response.js";
export {
  cellSite,
  generateVoronoi,
  type LatticeSite,
  RENDER_MODES,
  type RenderMode,
  siteColor,
  smoothBlend,
  type Vec2,
  type Vec3,
  type VoronoiConfig,
  VoronoiGenerator,
  type VoronoiSample,
} from "./voronoi.js";
