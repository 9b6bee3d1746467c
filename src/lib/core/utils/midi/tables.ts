/** Pitch-class names, sharps only, indexed by `midi % 12`. */
export const noteNames = [
  "C",
  "C#",
  "D",
  "D#",
  "E",
  "F",
  "F#",
  "G",
  "G#",
  "A",
  "A#",
  "B",
] as const;

/** Pitch classes that fall on black keys, indexed by `midi % 12`. */
export const blackKeyFlags = [
  false,
  true,
  false,
  true,
  false,
  false,
  true,
  false,
  true,
  false,
  true,
  false,
] as const;
