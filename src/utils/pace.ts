export function paceToSpeedKmh(secPerKm: number): number {
  return Math.round((3600 / secPerKm) * 10) / 10;
}

export function racePaceSeconds(timeSeconds: number, meters: number): number {
  return Math.round(timeSeconds / (meters / 1000));
}
