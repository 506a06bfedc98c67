export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export * from './analysis.js';
export * from './commits.js';
export * from './test-results.js';
