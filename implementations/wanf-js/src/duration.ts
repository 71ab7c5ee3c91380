/** Unit suffixes from largest to smallest, in nanoseconds */
const UNITS: ReadonlyArray<readonly [string, bigint]> = [
  ["h", 3_600_000_000_000n],
  ["m", 60_000_000_000n],
  ["s", 1_000_000_000n],
  ["ms", 1_000_000n],
  ["us", 1_000n],
  ["ns", 1n],
];

const PARSE_UNITS = new Map<string, bigint>([...UNITS, ["µs", 1_000n], ["μs", 1_000n]]);

const SEGMENT = /^(\d*)(?:\.(\d*))?([a-zµμ]+)/;

/** A span of time with nanosecond precision */
export class Duration {
  constructor(readonly nanoseconds: bigint) {}

  static readonly zero = new Duration(0n);

  static milliseconds(n: number): Duration {
    return new Duration(BigInt(n) * 1_000_000n);
  }

  static seconds(n: number): Duration {
    return new Duration(BigInt(n) * 1_000_000_000n);
  }

  static minutes(n: number): Duration {
    return new Duration(BigInt(n) * 60_000_000_000n);
  }

  static hours(n: number): Duration {
    return new Duration(BigInt(n) * 3_600_000_000_000n);
  }

  /**
   * Parse a sequence of decimal numbers with unit suffixes, e.g. `300ms`,
   * `1.5h` or `2h45m`, optionally signed. `0` needs no unit.
   */
  static parse(text: string): Duration {
    let rest = text;
    let negative = false;
    if (rest.startsWith("-") || rest.startsWith("+")) {
      negative = rest[0] === "-";
      rest = rest.slice(1);
    }
    if (rest === "0") {
      return new Duration(0n);
    }
    if (rest === "") {
      throw new Error(`invalid duration "${text}"`);
    }
    let total = 0n;
    while (rest.length > 0) {
      const match = SEGMENT.exec(rest);
      if (!match) {
        throw new Error(`invalid duration "${text}"`);
      }
      const [segment, whole, fraction = "", unitName] = match;
      if (whole === "" && fraction === "") {
        throw new Error(`invalid duration "${text}"`);
      }
      const unit = PARSE_UNITS.get(unitName);
      if (unit === undefined) {
        throw new Error(`unknown unit "${unitName}" in duration "${text}"`);
      }
      total += BigInt(whole || "0") * unit;
      if (fraction !== "") {
        total += (BigInt(fraction) * unit) / 10n ** BigInt(fraction.length);
      }
      rest = rest.slice(segment.length);
    }
    return new Duration(negative ? -total : total);
  }

  isZero(): boolean {
    return this.nanoseconds === 0n;
  }

  equals(other: Duration): boolean {
    return this.nanoseconds === other.nanoseconds;
  }

  toMilliseconds(): number {
    return Number(this.nanoseconds) / 1e6;
  }

  /** Largest unit that holds the value exactly: `90s`, `1500ms`, `2h` */
  toString(): string {
    if (this.nanoseconds === 0n) {
      return "0s";
    }
    const negative = this.nanoseconds < 0n;
    const abs = negative ? -this.nanoseconds : this.nanoseconds;
    for (const [name, size] of UNITS) {
      if (abs % size === 0n) {
        return `${negative ? "-" : ""}${abs / size}${name}`;
      }
    }
    return `${this.nanoseconds}ns`;
  }
}
