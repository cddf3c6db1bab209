/**
 * Known Dash distributions, in the order they are tried. The bundle id is
 * used to launch the app and doubles as its preferences domain.
 */
export interface DashTarget {
  label: string;
  bundleId: string;
  preferenceDomain: string;
}

export const DASH_TARGETS: readonly DashTarget[] = [
  {
    label: "Dash",
    bundleId: "com.kapeli.dashdoc",
    preferenceDomain: "com.kapeli.dashdoc",
  },
  {
    label: "Dash (Setapp)",
    bundleId: "com.kapeli.dash-setapp",
    preferenceDomain: "com.kapeli.dash-setapp",
  },
];

export const API_SERVER_ENABLED_KEY = "DHAPIServerEnabled";

export const LOCALHOST = "127.0.0.1";

export function baseUrlForPort(port: number): string {
  return `http://${LOCALHOST}:${port}`;
}
