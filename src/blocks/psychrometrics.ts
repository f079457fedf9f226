import { z } from "zod";
import { defineBlock, type BlockType } from "../block.js";
import { num, port } from "./shared.js";

const KELVIN = 273.15;

const airState = [port("TDryBul"), port("phi")];
const atmosphere = z.object({ p_atm: z.number().positive().default(101325) }).strict();

/** Antoine equation for water, in Pa. */
function saturationPressure(T: number): number {
  const c = T - KELVIN;
  return 10 ** (8.07131 - 1730.63 / (233.426 + c)) * 133.322;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export const psychrometricBlocks: BlockType[] = [
  // Magnus formula.
  defineBlock({
    type: "Psychrometrics.DewPoint_TDryBulPhi",
    description: "Dew point temperature from dry bulb temperature and relative humidity",
    parameters: z.object({}).strict(),
    inputs: airState,
    outputs: [port("TDewPoi")],
    evaluate: ({ inputs }) => {
      const c = num(inputs, "TDryBul") - KELVIN;
      const phi = clamp(num(inputs, "phi"), 0.01, 0.99);
      const gamma = (17.27 * c) / (237.7 + c) + Math.log(phi);
      return { TDewPoi: (237.7 * gamma) / (17.27 - gamma) + KELVIN };
    },
  }),
  defineBlock({
    type: "Psychrometrics.SpecificEnthalpy_TDryBulPhi",
    description: "Specific enthalpy of moist air from dry bulb temperature and relative humidity",
    parameters: atmosphere,
    inputs: airState,
    outputs: [port("h")],
    evaluate: ({ inputs, params }) => {
      const T = num(inputs, "TDryBul");
      const pVap = clamp(num(inputs, "phi"), 0, 1) * saturationPressure(T);
      const w = (0.622 * pVap) / (params.p_atm - pVap);
      return { h: 1006 * (T - KELVIN) + w * (2501000 + 1860 * (T - KELVIN)) };
    },
  }),
  // Stull's empirical fit.
  defineBlock({
    type: "Psychrometrics.WetBulb_TDryBulPhi",
    description: "Wet bulb temperature from dry bulb temperature and relative humidity",
    parameters: z.object({}).strict(),
    inputs: airState,
    outputs: [port("TWetBul")],
    evaluate: ({ inputs }) => {
      const T = num(inputs, "TDryBul");
      const c = T - KELVIN;
      const rh = clamp(num(inputs, "phi"), 0.01, 1) * 100;
      const wet =
        c * Math.atan(0.151977 * Math.sqrt(rh + 8.313659)) +
        Math.atan(c + rh) -
        Math.atan(rh - 1.676331) +
        0.00391838 * rh ** 1.5 * Math.atan(0.023101 * rh) -
        4.686035;
      return { TWetBul: Math.min(wet + KELVIN, T) };
    },
  }),
];
