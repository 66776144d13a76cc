import { validateSync } from 'class-validator';

function describe(errors: ReturnType<typeof validateSync>): string {
  return errors
    .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
    .join('; ');
}

/**
 * # Piece of application config
 *
 * Subclasses declare properties with `@UseEnv` and class-validator rules.
 * The whole fragment is validated once, when the provider is constructed.
 */
export abstract class ConfigFragment {
  constructor() {
    const errors = validateSync(this);
    if (errors.length > 0) {
      throw new Error(
        `Invalid ${this.constructor.name}: ${describe(errors)}`,
      );
    }
  }
}
