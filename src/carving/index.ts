export { carve, carveSteps, type CarveOptions, type CarvePhase, type CarveProgress } from './carver.js';
export {
  GradientEnergy,
  SobelEnergy,
  energyMapFromRows,
  resolveEnergyComputer,
  toGrayscale,
  type EnergyComputer,
  type EnergyMap,
  type EnergyMethod,
} from './energy.js';
export { CarvingError, DimensionMismatchError, InvalidBufferError, InvalidTargetError } from './errors.js';
export {
  createPixelBuffer,
  getPixel,
  pixelBufferFromRows,
  pixelBuffersEqual,
  transpose,
  type PixelBuffer,
  type Rgb,
} from './pixel-buffer.js';
export { computeCumulativeEnergy, findVerticalSeam, type CumulativeEnergy, type Seam } from './seam-finder.js';
export { removeVerticalSeam } from './seam-remover.js';
