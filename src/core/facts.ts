import type { Hex } from "./types";

/** Attestation collaborator: has this exact fact been proven? */
export interface FactsRegistry {
  isValid(fact: Hex): boolean;
}

export class MemoryFactsRegistry implements FactsRegistry {
  private readonly facts = new Set<string>();

  register(fact: Hex): void {
    this.facts.add(fact.toLowerCase());
  }

  isValid(fact: Hex): boolean {
    return this.facts.has(fact.toLowerCase());
  }
}
