import { isIrrefutable } from "../../core/pattern/names";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { CaseBundle, Pass, PassResult } from "../types";

export const unreachableArmPass: Pass = {
  id: "analyze/unreachable-arm",
  name: "Unreachable Arm Check",
  phase: "analyze",
  dependencies: ["validate/well-formed"],
  run(bundle: CaseBundle): PassResult {
    const diagnostics: Diagnostic[] = [];
    const catchAll = bundle.cases.findIndex(c => !c.guard && isIrrefutable(c.pattern));
    if (catchAll === -1) return { diagnostics };

    for (let i = catchAll + 1; i < bundle.cases.length; i++) {
      diagnostics.push(makeDiagnostic("W0700", { shadowedBy: catchAll }, `cases[${i}]`));
    }
    return { diagnostics, metadata: { catchAll } };
  },
};
