/** Base class for every error raised while configuring or building a fire simulation. */
export class FireSimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A configuration field is missing, malformed or out of range. */
export class InvalidConfigurationError extends FireSimulationError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.field = field;
  }
}

/** The requested zone layout cannot produce any perimeter. */
export class DegenerateGeometryError extends FireSimulationError {
  readonly zoneCount: number;

  constructor(zoneCount: number) {
    super(`Zone count must be a positive integer, got ${zoneCount}`);
    this.zoneCount = zoneCount;
  }
}
