export { minMaxNormalize } from "./normalize";
export { mean, sampleStdDev, trailingWindow } from "./rolling-window";
