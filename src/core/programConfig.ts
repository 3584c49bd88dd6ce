import type { ProgramInfo, ProgramOutput } from "./types";
import { fail } from "./errors";
import { ZERO, feltToHex } from "./felt";

export const EMPTY_PROGRAM_INFO: ProgramInfo = {
  programHash: ZERO,
  configHash: ZERO,
};

/** The output must come from the configuration this appchain trusts. */
export const assertProgramMatches = (p: ProgramInfo, out: ProgramOutput): void => {
  if (out.configHash !== p.configHash)
    fail("InvalidConfigHash", "config hash mismatch", {
      expected: feltToHex(p.configHash),
      got: feltToHex(out.configHash),
    });
};
