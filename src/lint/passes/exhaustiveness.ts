import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { checkExhaustiveness } from "../analysis/exhaustiveness";
import type { CaseBundle, Pass, PassResult } from "../types";

export const exhaustivenessPass: Pass = {
  id: "analyze/exhaustiveness",
  name: "Exhaustiveness Check",
  phase: "analyze",
  dependencies: ["validate/well-formed"],
  run(bundle: CaseBundle): PassResult {
    const diagnostics: Diagnostic[] = [];
    if (!bundle.subject) return { diagnostics };

    const uncovered = [...checkExhaustiveness(bundle.subject, bundle.cases)];
    if (uncovered.length > 0) {
      diagnostics.push(
        makeDiagnostic("W0701", { type: bundle.subject.name, missing: uncovered.join(", ") }, "cases")
      );
    }
    return { diagnostics, metadata: { uncovered } };
  },
};
