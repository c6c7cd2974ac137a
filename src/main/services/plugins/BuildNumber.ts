const SNAPSHOT_COMPONENT = Number.MAX_SAFE_INTEGER;
const PRODUCT_CODE_PATTERN = /^([A-Za-z]{1,8})-(.+)$/;

/**
 * Host build identifier, e.g. `PU-141.2735` or `141.SNAPSHOT`.
 * `SNAPSHOT` and `*` components sort above any number, so `141.*` bounds the whole 141 line.
 */
export class BuildNumber {
  private constructor(
    readonly productCode: string | null,
    readonly components: readonly number[]
  ) {}

  static parse(value: string): BuildNumber | null {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }

    const prefixed = trimmed.match(PRODUCT_CODE_PATTERN);
    const productCode = prefixed?.[1] ?? null;
    const body = prefixed?.[2] ?? trimmed;

    const components: number[] = [];
    for (const part of body.split('.')) {
      if (/^\d+$/.test(part)) {
        components.push(Number(part));
      } else if (part === 'SNAPSHOT' || part === '*') {
        components.push(SNAPSHOT_COMPONENT);
      } else {
        return null;
      }
    }

    return new BuildNumber(productCode ? productCode.toUpperCase() : null, components);
  }

  compareTo(other: BuildNumber): number {
    const size = Math.max(this.components.length, other.components.length);
    for (let index = 0; index < size; index += 1) {
      const left = this.components[index] ?? 0;
      const right = other.components[index] ?? 0;
      if (left !== right) {
        return left < right ? -1 : 1;
      }
    }

    return 0;
  }

  asString(): string {
    const body = this.components.map((part) => (part === SNAPSHOT_COMPONENT ? 'SNAPSHOT' : String(part))).join('.');
    return this.productCode ? `${this.productCode}-${body}` : body;
  }
}
