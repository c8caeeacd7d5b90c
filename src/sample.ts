/**
 * Domain sampling and attempt generation.
 *
 * Sampling is deterministic: the same domain always yields the same value.
 * Every rule below works on exact interval sets, so none of them loops over
 * individual integers.
 */

import { Assignment, BooleanValueDomain, Domain, IntegerNumberDomain, Variable } from "./expr";
import { complementSet, intersectSets, lowestMember, preferredMember, subtractSets } from "./domain";
import { domainContains, evaluateDomain, reduceInteger } from "./reduce";
import { AssignedValue, booleanAssigned, integer, integerAssigned } from "./value";

export function sampleBoolean(d: BooleanValueDomain): boolean | undefined {
  switch (d.tag) {
    case "empty":
      return undefined;
    case "universe":
      return false;
    case "single":
      return d.value;
  }
}

/**
 * A representative of an integer domain, or undefined when the domain is
 * empty or still depends on a variable.
 */
export function sampleInteger(d: IntegerNumberDomain): bigint | undefined {
  switch (d.tag) {
    case "empty":
      return undefined;

    case "universe":
      return 0n;

    case "explicitSet":
      for (const element of d.elements) {
        const r = reduceInteger(element);
        if (r.tag !== "value") return undefined;
        if (r.value.tag === "value") return r.value.value;
      }
      return undefined;

    case "union":
      return sampleInteger(d.left) ?? sampleInteger(d.right);

    case "intersection": {
      const left = sampleInteger(d.left);
      if (left !== undefined && isMember(d.right, left)) return left;
      const right = sampleInteger(d.right);
      if (right !== undefined && isMember(d.left, right)) return right;
      const l = evaluateDomain(d.left);
      const r = evaluateDomain(d.right);
      return l && r ? preferredMember(intersectSets(l, r)) : undefined;
    }

    case "difference": {
      const left = sampleInteger(d.left);
      if (left !== undefined && isMember(d.right, left) === false) return left;
      const l = evaluateDomain(d.left);
      const r = evaluateDomain(d.right);
      return l && r ? preferredMember(subtractSets(l, r)) : undefined;
    }

    case "complement": {
      const inner = evaluateDomain(d.domain);
      return inner && lowestMember(complementSet(inner));
    }

    default: {
      const set = evaluateDomain(d);
      return set && lowestMember(set);
    }
  }
}

function isMember(d: IntegerNumberDomain, v: bigint): boolean | undefined {
  return domainContains(d, integer(v));
}

export function sample(d: Domain): AssignedValue | undefined {
  if (d.tag === "boolean") {
    const value = sampleBoolean(d.domain);
    return value === undefined ? undefined : booleanAssigned(value);
  }
  const value = sampleInteger(d.domain);
  return value === undefined ? undefined : integerAssigned(integer(value));
}

/**
 * Whether a concrete value lies in a domain; undefined while the domain
 * still depends on a variable.
 */
export function domainAdmits(d: Domain, v: AssignedValue): boolean | undefined {
  if (d.tag === "boolean") {
    if (v.tag !== "boolean") return false;
    switch (d.domain.tag) {
      case "universe":
        return true;
      case "empty":
        return false;
      case "single":
        return d.domain.value === v.value;
    }
  }
  return v.tag === "integer" ? domainContains(d.domain, v.value) : false;
}

/**
 * Sample every variable in order. All or nothing: one unsamplable domain
 * fails the whole attempt.
 */
export function generateAttempt(free: Variable[]): Assignment[] | undefined {
  const attempt: Assignment[] = [];
  for (const v of free) {
    const value = sample(v.domain);
    if (value === undefined) return undefined;
    attempt.push({ name: v.name, value });
  }
  return attempt;
}

/**
 * The first variable whose domain cannot be sampled.
 */
export function firstUnsamplable(free: Variable[]): Variable | undefined {
  return free.find(v => sample(v.domain) === undefined);
}
