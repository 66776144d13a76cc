const UNSET = Symbol('unset');

/**
 * # Binds a config property to an environment variable
 *
 * The value is read lazily on first access and memoized per class.
 * A throwing transform is reported with the variable name.
 */
export const UseEnv =
  <TProperty>(
    name: string,
    transform?: (raw?: string) => TProperty,
  ): PropertyDecorator =>
  (proto, propertyKey) => {
    let computed: TProperty | string | undefined | typeof UNSET = UNSET;

    Object.defineProperty(proto, propertyKey, {
      enumerable: true,
      get() {
        if (computed === UNSET) {
          const raw = process.env[name];

          if (transform) {
            try {
              computed = transform(raw);
            } catch (err) {
              throw new Error(`Failed to transform config ${name}: ${err}`);
            }
          } else {
            computed = raw;
          }
        }

        return computed;
      },
    });
  };
