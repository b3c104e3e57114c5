export { Modulator, stepModulator } from "./modulator.js";
export {
  resolveParameterPath,
  readTarget,
  writeTarget,
  SESSION_PARAMETERS,
  LAYER_NAMES
} from "./parameter-path.js";
export type { ParameterTarget, LayerTarget, SessionParameter, LayerFieldAccessor } from "./parameter-path.js";
