/**
 * Renderer Types
 */

/**
 * Rendering options for customizing output display
 */
export interface RenderOptions {
  /**
   * Whether to use colors in output
   * @default true
   */
  useColors?: boolean;

  /**
   * Maximum width of the description column (0 = no limit)
   * @default 60
   */
  maxDescriptionWidth?: number;
}

/**
 * Header information for a run
 */
export interface RunHeader {
  invocationId: string;
  target: string;
  kind: 'agent' | 'workflow';
  outputDir: string;
  stepCount: number;
}

/**
 * JSON shape of an execution result (errors flattened to plain data)
 */
export interface SerializedResult {
  target: string;
  kind: 'agent' | 'workflow';
  invocationId: string;
  status: string;
  outputDir: string;
  durationMs: number;
  artifacts: string[];
  steps: Array<{
    position: number;
    name: string;
    status: string;
    exitCode: number | null;
    signal: string | null;
    durationMs?: number;
    diagnostic?: string;
    artifacts: string[];
  }>;
  failedStep?: { position: number; name: string; status: string; diagnostic: string };
  error?: { name: string; code: string; message: string };
}
