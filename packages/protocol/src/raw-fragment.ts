// Raw Fragment - Pre-serialized JSON text that is written verbatim

/**
 * A piece of JSON text that has already been serialized.
 *
 * Writers embed it as-is, never quoting or escaping it. Keeping it distinct
 * from `string` stops a payload from being encoded a second time.
 */
export class RawFragment {
  private constructor(readonly json: string) {}

  /** Serialize a value once, up front, so it can be embedded later without re-encoding. */
  static serialize(value: unknown): RawFragment {
    const json: string | undefined = JSON.stringify(value);
    if (json === undefined) {
      throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
    }
    return new RawFragment(json);
  }

  /**
   * Wrap text the caller vouches for. Not validated: a malformed fragment
   * corrupts whatever document it is written into.
   */
  static trusted(json: string): RawFragment {
    return new RawFragment(json);
  }

  toString(): string {
    return this.json;
  }
}
