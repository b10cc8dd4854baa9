export type ReferenceSide = 'from' | 'to';

export interface ConversionRecord {
  inputPotential: number;
  fromRef: string;
  toRef: string;
  result: number;
  /** Epoch milliseconds */
  timestamp: number;
}

export interface SessionState {
  potential: number;
  fromRef: string;
  toRef: string;
  /** Ordered most-recent-last */
  history: readonly ConversionRecord[];
  lastResult: ConversionRecord | null;
  /** Message to surface to the user, cleared by the next successful transition */
  error: string | null;
}

export interface SessionDefaults {
  potential?: number;
  fromRef?: string;
  toRef?: string;
}
