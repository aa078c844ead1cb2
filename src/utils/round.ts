/**
 * Round to `decimals` places. Exact binary ties go to the even neighbour,
 * so 2.5 rounds to 2 and 19.125 to 19.12.
 */
export function roundHalfEven(value: number, decimals: number = 0): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);

  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}
