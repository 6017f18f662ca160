/** Yield strengths (Pa) of the materials offered in the shaft-design task. */
export const MATERIAL_YIELD_STRENGTH_PA: ReadonlyMap<string, number> = new Map([
  ["Steel_1020", 3.5e8],
  ["Aluminum_6061-T6", 2.7e8],
  ["Titanium_Ti-6Al-4V", 8.3e8]
]);
