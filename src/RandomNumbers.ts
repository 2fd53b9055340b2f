const DEFAULT_SEED = 0x50000;

// A 24-bit linear congruential generator, so runs are repeatable for a given
// seed.
export class RandomNumbers {
  state: number;

  constructor(seed: number = DEFAULT_SEED) {
    this.state = seed & 0xffffff;
  }

  setSeed(seed: number) {
    this.state = Math.trunc(seed) & 0xffffff;
  }

  // Negative RND arguments pick a sequence from the bits of the argument.
  reseed(value: number) {
    const bits = new DataView(new ArrayBuffer(4));
    bits.setFloat32(0, value);
    this.state = (bits.getUint32(0) ^ (bits.getUint32(0) >>> 8)) & 0xffffff;
  }

  getRandom(advance: boolean): number {
    if (advance) {
      this.state = (this.state * 0xfd43fd + 0xc39ec3) & 0xffffff;
    }
    return this.state / 0x1000000;
  }
}
