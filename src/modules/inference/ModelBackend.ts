
/**
 * Contract for a drop-in inference backend.
 *
 * `predict` receives a `size x size x 3` tensor in row-major HWC order with
 * every channel already normalized to [-1, 1], and resolves to
 * `[riskScore, confidence]`. Values outside [0, 1] are clamped by the caller.
 */
export interface ModelBackend {
  predict(input: Float32Array, size: number): Promise<readonly [number, number]>;
  dispose(): void;
}

export type ModelBackendLoader = () => Promise<ModelBackend>;
