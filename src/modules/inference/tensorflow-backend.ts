import * as tf from '@tensorflow/tfjs';
import { ScreeningError } from '../errors/ScreeningError';
import type { ModelBackend } from './ModelBackend';

export interface TensorFlowBackendOptions {
  // e.g. 'webgl' in the browser, 'cpu' under Node
  preferredBackend?: string;
}

/**
 * Wraps a tfjs LayersModel with a `[1, size, size, 3]` input and two outputs.
 */
export class TensorFlowModelBackend implements ModelBackend {
  private model: tf.LayersModel | null;

  private constructor(model: tf.LayersModel) {
    this.model = model;
  }

  /**
   * Loads a packaged model (a `model.json` URL or any tfjs IOHandler).
   * Rejects with BACKEND_UNAVAILABLE when the model cannot be read.
   */
  public static async load(
    source: string | tf.io.IOHandler,
    options: TensorFlowBackendOptions = {}
  ): Promise<TensorFlowModelBackend> {
    if (options.preferredBackend && tf.getBackend() !== options.preferredBackend) {
      const switched = await tf.setBackend(options.preferredBackend);
      if (switched) {
        console.log(`TensorFlowModelBackend: switched backend to ${options.preferredBackend}`);
      } else {
        console.warn(
          `TensorFlowModelBackend: backend ${options.preferredBackend} unavailable, staying on ${tf.getBackend()}`
        );
      }
    }
    await tf.ready();

    let model: tf.LayersModel;
    try {
      model = await tf.loadLayersModel(source);
    } catch (error) {
      throw new ScreeningError('BACKEND_UNAVAILABLE', 'Could not load the risk model', error);
    }
    console.log('TensorFlowModelBackend: model loaded', {
      inputShape: model.inputs.map(input => input.shape),
      backend: tf.getBackend()
    });
    return new TensorFlowModelBackend(model);
  }

  public static fromModel(model: tf.LayersModel): TensorFlowModelBackend {
    return new TensorFlowModelBackend(model);
  }

  public async predict(input: Float32Array, size: number): Promise<readonly [number, number]> {
    if (!this.model) {
      throw new Error('TensorFlowModelBackend: model already disposed');
    }

    const inputTensor = tf.tensor4d(input, [1, size, size, 3]);
    let outputs: tf.Tensor[] = [];
    try {
      const prediction = this.model.predict(inputTensor);
      outputs = Array.isArray(prediction) ? prediction : [prediction];

      const values = await outputs[0].data();
      if (values.length < 2) {
        throw new Error(`TensorFlowModelBackend: expected 2 outputs, got ${values.length}`);
      }
      return [values[0], values[1]] as const;
    } finally {
      // Release GPU/CPU tensor memory
      inputTensor.dispose();
      outputs.forEach(tensor => tensor.dispose());
    }
  }

  public dispose(): void {
    if (this.model) {
      this.model.dispose();
      this.model = null;
      console.log('TensorFlowModelBackend: model released');
    }
  }
}
