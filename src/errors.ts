/**
 * Base class for failures that abort a single configuration entry.
 * The batch runner catches these, reports them and moves on.
 */
export class GeneratorError extends Error {
  constructor(message: string, public readonly entry?: string) {
    super(entry ? `${entry}: ${message}` : message);
    this.name = new.target.name;
  }
}

/** Unknown pitch or density, contradictory or malformed parameters, unknown references. */
export class ConfigurationError extends GeneratorError {}

/** A clearance or size constraint that cannot be met. */
export class GeometryError extends GeneratorError {}
