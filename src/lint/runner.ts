import type { Diagnostic } from "../outcome/diagnostic";
import { exhaustivenessPass } from "./passes/exhaustiveness";
import { unreachableArmPass } from "./passes/unreachableArm";
import { wellFormedPass } from "./passes/wellFormed";
import type { CaseBundle, LintConfig, Pass, PassConfig, PassPhase, PassResult } from "./types";

const DEFAULT_CONFIG: LintConfig = { passes: {} };
const PHASE_ORDER: PassPhase[] = ["validate", "analyze"];

export interface LintReport {
  diagnostics: Diagnostic[];
  passResults: Map<string, PassResult>;
}

export class LintRunner {
  private passes: Map<string, Pass> = new Map();
  private config: LintConfig;

  constructor(config: Partial<LintConfig> = DEFAULT_CONFIG) {
    this.config = { passes: config.passes ?? {} };
  }

  register(pass: Pass): void {
    this.passes.set(pass.id, pass);
  }

  run(bundle: CaseBundle): LintReport {
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();

    for (const pass of this.resolvePassOrder()) {
      const config = this.getPassConfig(pass.id);
      const result = pass.run(bundle);
      passResults.set(pass.id, result);
      diagnostics.push(...applySeverityOverride(result.diagnostics, config.severityOverride));
    }

    return { diagnostics, passResults };
  }

  hasErrors(diags: Diagnostic[]): boolean {
    return diags.some(d => d.severity === "error");
  }

  /** Phases in order; within a phase, dependencies first, ties broken by id. */
  private resolvePassOrder(): Pass[] {
    const enabled = Array.from(this.passes.values()).filter(p => this.isPassEnabled(p.id));
    const lookup = new Map(enabled.map(p => [p.id, p]));
    const ordered: Pass[] = [];
    const executed = new Set<string>();

    for (const phase of PHASE_ORDER) {
      const phasePasses = enabled.filter(p => p.phase === phase);
      const indegree = new Map<string, number>(phasePasses.map(p => [p.id, 0]));
      const edges = new Map<string, string[]>(phasePasses.map(p => [p.id, []]));

      for (const pass of phasePasses) {
        for (const dep of this.enabledDependencies(pass)) {
          const depPass = lookup.get(dep);
          if (!depPass) {
            throw new Error(`Pass dependency not registered: ${dep}`);
          }
          const depPhase = PHASE_ORDER.indexOf(depPass.phase);
          const passPhase = PHASE_ORDER.indexOf(pass.phase);
          if (depPhase > passPhase) {
            throw new Error(`Pass ${pass.id} depends on ${dep} in later phase ${depPass.phase}`);
          }
          if (depPhase < passPhase) {
            if (!executed.has(dep)) {
              throw new Error(`Pass dependency has not run: ${dep} (required by ${pass.id})`);
            }
            continue;
          }
          edges.get(dep)?.push(pass.id);
          indegree.set(pass.id, (indegree.get(pass.id) ?? 0) + 1);
        }
      }

      const ready = phasePasses.filter(p => indegree.get(p.id) === 0).sort(byId);
      let processed = 0;
      for (let next = ready.shift(); next; next = ready.shift()) {
        ordered.push(next);
        executed.add(next.id);
        processed++;

        for (const target of edges.get(next.id) ?? []) {
          const updated = (indegree.get(target) ?? 0) - 1;
          indegree.set(target, updated);
          const targetPass = lookup.get(target);
          if (updated === 0 && targetPass) {
            ready.push(targetPass);
            ready.sort(byId);
          }
        }
      }

      if (processed !== phasePasses.length) {
        throw new Error(`Pass dependency cycle detected in phase ${phase}`);
      }
    }

    return ordered;
  }

  private getPassConfig(passId: string): PassConfig {
    return this.config.passes[passId] ?? { enabled: true };
  }

  private isPassEnabled(passId: string): boolean {
    const config = this.getPassConfig(passId);
    return config.enabled !== false && config.severityOverride !== "off";
  }

  private enabledDependencies(pass: Pass): string[] {
    return (pass.dependencies ?? []).filter(dep => this.isPassEnabled(dep));
  }
}

function byId(a: Pass, b: Pass): number {
  return a.id.localeCompare(b.id);
}

function applySeverityOverride(diagnostics: Diagnostic[], override?: PassConfig["severityOverride"]): Diagnostic[] {
  if (!override || override === "off") {
    return diagnostics;
  }
  const severity = override;
  return diagnostics.map(d => ({ ...d, severity }));
}

export function createDefaultRunner(config?: Partial<LintConfig>): LintRunner {
  const runner = new LintRunner(config ?? DEFAULT_CONFIG);
  runner.register(wellFormedPass);
  runner.register(unreachableArmPass);
  runner.register(exhaustivenessPass);
  return runner;
}

/** Runs the default passes over a case list. */
export function lintCases(bundle: CaseBundle, config?: Partial<LintConfig>): LintReport {
  return createDefaultRunner(config).run(bundle);
}
