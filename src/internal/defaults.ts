/**
 * Derived and customary units available when the alias manager is built with
 * defaults. Each entry may refer to the ones before it.
 */
export const DEFAULT_ALIASES: ReadonlyArray<string> = [
  "N = kg*m/s**2",
  "J = N*m",
  "W = J/s",
  "C = A*s",
  "V = W/A",
  "Ohm = V/A",
  "ohm = Ohm",
  "Ω = Ohm",
  "Hz = 1/s",
  "Pa = N/m**2",
  "T = kg/(A*s**2)",
  "F = C/V",
  "Wb = V*s",
  "H = Wb/A",
  "min = 60*s",
  "h = 60*min",
  "day = 24*h",
  "week = 7*day",
  "year = 31557600*s",
  "month = year/12",
  "ton = 1000*kg",
  "L = dm**3",
  "atm = 101325*Pa",
  "bar = 100000*Pa",
  "eV = 1.602176634e-19*J",
  "cal = 4.184*J",
  "deg = 0.017453292519943295*rad",
]
