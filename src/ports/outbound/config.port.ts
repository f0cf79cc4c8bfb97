export interface ConfigPort {
  getDefaultModel(): Promise<string>;
  setDefaultModel(model: string): Promise<void>;
  getMaxIterations(): Promise<number>;
  setMaxIterations(maxIterations: number): Promise<void>;
}
