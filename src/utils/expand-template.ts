import { format } from "date-fns";

/**
 * Replace date/time and application-name placeholders in a file-name template
 *
 * @example
 * expandTemplate("{yyyy}-{mm}-{dd}_{appname}.log", new Date(2024, 2, 15), "prom-convert")
 * // "2024-03-15_prom-convert.log"
 */
export function expandTemplate(
  template: string,
  now: Date = new Date(),
  appName: string = "prom-convert",
): string {
  return template
    .replaceAll("{yyyy}", format(now, "yyyy"))
    .replaceAll("{mm}", format(now, "MM"))
    .replaceAll("{dd}", format(now, "dd"))
    .replaceAll("{HH}", format(now, "HH"))
    .replaceAll("{MM}", format(now, "mm"))
    .replaceAll("{SS}", format(now, "ss"))
    .replaceAll("{appname}", appName);
}
