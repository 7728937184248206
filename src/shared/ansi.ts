/** Terminal styling shared by the banner and the pretty log output */

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const wrap =
  (...codes: string[]) =>
  (s: string): string =>
    `${codes.map(esc).join("")}${s}${reset}`;

/** Padded badge on a coloured background */
const badge =
  (bg: string, fg: string) =>
  (s: string): string =>
    `${esc(bg)}${esc(fg)} ${s} ${reset}`;

export const bold = wrap("1");
export const dim = wrap("2");

export const red = wrap("31");
export const green = wrap("32");
export const yellow = wrap("33");
export const magenta = wrap("35");
export const cyan = wrap("36");
export const gray = wrap("90");
export const white = wrap("97");

export const bgRed = badge("41", "97");
export const bgGreen = badge("42", "30");
export const bgYellow = badge("43", "30");
export const bgMagenta = badge("45", "97");
export const bgCyan = badge("46", "30");
