export type { AtmosphereOptions } from "./refraction.js";
export {
  refractionFromApparentAltitude,
  refractionFromApparentAltitude15,
  refractionFromTrueAltitude,
} from "./refraction.js";
export { lunarHorizontalParallax, lunarSemidiameter } from "./lunar.js";
