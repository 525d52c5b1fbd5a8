import { validatePattern } from "../../core/pattern/validate";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { CaseBundle, Pass, PassResult } from "../types";

export const wellFormedPass: Pass = {
  id: "validate/well-formed",
  name: "Pattern Well-Formedness",
  phase: "validate",
  run(bundle: CaseBundle): PassResult {
    const diagnostics: Diagnostic[] = [];
    bundle.cases.forEach((c, i) => {
      diagnostics.push(
        ...validatePattern(c.pattern, {
          allowShadowing: bundle.allowShadowing,
          path: `cases[${i}].pattern`,
        })
      );
    });
    return { diagnostics };
  },
};
