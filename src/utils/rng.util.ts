/**
 * Same seed → same output sequence.
 */
export function mulberry32(seed: number) {
  let t = seed >>> 0;
  return {
    next_uint32(): number {
      t += 0x6D2B79F5;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0);
    },
    get state(): number { return t >>> 0; }
  };
}

/** Where die faces come from. `sides` is always >= 2. */
export interface DieSource {
  next_face(sides: number): number;
}

/** Reproducible rolls for a given seed. */
export function seeded_die_source(seed: number): DieSource & { readonly state: number } {
  const rng = mulberry32(seed);
  return {
    next_face: (sides) => 1 + (rng.next_uint32() % sides),
    get state() { return rng.state; },
  };
}

export function random_die_source(): DieSource {
  return { next_face: (sides) => Math.floor(Math.random() * sides) + 1 };
}

/**
 * Replays fixed faces in order, for tests and scripted demos.
 * Throws when the sequence runs out or a face cannot come up on the requested die.
 */
export function sequence_die_source(faces: readonly number[]): DieSource & { readonly remaining: number } {
  let i = 0;
  return {
    next_face(sides) {
      if (i >= faces.length) {
        throw new Error(`die sequence exhausted after ${faces.length} roll(s)`);
      }
      const face = faces[i++];
      if (!Number.isInteger(face) || face < 1 || face > sides) {
        throw new Error(`face ${face} cannot come up on a d${sides}`);
      }
      return face;
    },
    get remaining() { return faces.length - i; },
  };
}
