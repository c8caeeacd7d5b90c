/**
 * Structural checks run before solving.
 *
 * These catch programs that are well typed but cannot be solved meaningfully:
 * a domain bound that mentions an undeclared symbol, a symbol used with two
 * kinds, a symbol declared twice.
 */

import {
  BooleanIntegerNumberExpression,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  Sym,
  ValueKind,
  Variable,
  programDeclarations,
  programGoals,
  requiredConstraints,
} from "./expr";
import { freeOfConstraint, freeOfDomain, freeOfInteger, freeOfIntegerDomain } from "./free";

export const UNDECLARED_IN_DOMAIN = "undeclared variable in domain";
export const CONFLICTING_KINDS = "conflicting variable kinds";
export const DUPLICATE_DECLARATION = "duplicate declaration";

export interface ProgramIssue {
  symbol: Sym;
  reason: string;
}

/**
 * Symbols mentioned inside `in` domains of a constraint.
 */
function domainSymbols(c: ConstraintLogicExpression): Variable[] {
  if (c.tag === "boolean") return [];
  const e: BooleanIntegerNumberExpression = c.expr;
  return e.tag === "in" ? freeOfIntegerDomain(e.domain) : [];
}

export function validateProgram(p: ConstraintProgramExpression): ProgramIssue[] {
  const issues: ProgramIssue[] = [];
  const declarations = programDeclarations(p);
  const constraints = requiredConstraints(p);

  // duplicate declarations
  const declared = new Map<string, ValueKind>();
  for (const d of declarations) {
    if (declared.has(d.name.name)) issues.push({ symbol: d.name, reason: DUPLICATE_DECLARATION });
    else declared.set(d.name.name, d.domain.tag);
  }

  // symbols inside domains must be declared
  const inDomains = [
    ...declarations.flatMap(d => freeOfDomain(d.domain)),
    ...constraints.flatMap(domainSymbols),
  ];
  for (const v of inDomains) {
    if (!declared.has(v.name.name)) issues.push({ symbol: v.name, reason: UNDECLARED_IN_DOMAIN });
  }

  // one kind per symbol
  const uses: Variable[] = [
    ...declarations.map(d => ({ name: d.name, domain: d.domain })),
    ...declarations.flatMap(d => freeOfDomain(d.domain)),
    ...constraints.flatMap(freeOfConstraint),
    ...programGoals(p).flatMap(g => (g.tag !== "satisfy" && g.objective ? freeOfInteger(g.objective) : [])),
  ];
  const kinds = new Map<string, ValueKind>();
  for (const v of uses) {
    const known = kinds.get(v.name.name);
    if (known === undefined) kinds.set(v.name.name, v.domain.tag);
    else if (known !== v.domain.tag) issues.push({ symbol: v.name, reason: CONFLICTING_KINDS });
  }

  return dedupe(issues);
}

function dedupe(issues: ProgramIssue[]): ProgramIssue[] {
  const seen = new Set<string>();
  return issues.filter(i => {
    const key = `${i.symbol.name}\u0000${i.reason}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
