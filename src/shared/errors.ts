// Raised for invalid run parameters or unusable inputs, before any computation starts.
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Raised when a rupture description is structurally unusable. Aborts the run.
export class RuptureParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuptureParseError';
  }
}

// Raised when a named rupture file does not exist.
export class RuptureNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuptureNotFoundError';
  }
}

// Raised by the Vincenty inverse when its iteration does not settle.
export class GeodesicConvergenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeodesicConvergenceError';
  }
}

// Raised when the injected dislocation solver returns an unusable gradient.
export class SolverOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolverOutputError';
  }
}
