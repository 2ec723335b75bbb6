export interface StatusInfo {
  label: string;
  gradient: string;
  autoRotate: boolean;
  fps: number;
}

const HELP = "[r]otate [c]olor [m]ode [0]reset [q]uit";

/** Widest status variant that fits in `width` columns, or "" when none does. */
export function formatStatus(info: StatusInfo, width: number): string {
  const rotation = info.autoRotate ? "auto" : "manual";
  const medium = `${info.label} | ${info.gradient} | ${rotation} | ${Math.round(info.fps)}fps`;
  const variants = [`${medium} | ${HELP}`, medium, `${info.label} | ${info.gradient}`];
  return variants.find((v) => width > [...v].length) ?? "";
}
