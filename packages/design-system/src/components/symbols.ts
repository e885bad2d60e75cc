import { palette } from "../tokens/colors.js";

export const symbols = {
  info: palette.info("●"),
  success: palette.info("◆"),
  verbose: palette.muted("│"),
  resolved: palette.resolvedSymbol
} as const;
