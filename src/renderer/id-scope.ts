import { randomBytes } from 'node:crypto';
import { ConfigurationError } from '../core/errors.js';
import type { UniqueIdOption } from '../core/types.js';

/**
 * Hands out the ids a scene defines and references.
 *
 * Definitions and references both go through the scope, so a suffix is
 * applied to every occurrence or to none. The scope also remembers what
 * was referenced so the composer can reject dangling references. Class and
 * keyframes names take the same suffix, since an inline `<style>` block is
 * global to the page it is embedded in.
 */
export class IdScope {
  private readonly defined = new Set<string>();
  private readonly referenced = new Set<string>();

  constructor(readonly suffix?: string) {}

  resolve(name: string): string {
    return this.suffix ? `${name}-${this.suffix}` : name;
  }

  define(name: string): string {
    this.defined.add(name);
    return this.resolve(name);
  }

  ref(name: string): string {
    this.referenced.add(name);
    return this.resolve(name);
  }

  /** Class or keyframes name; suffixed like ids but never tracked as a reference */
  name(base: string): string {
    return this.resolve(base);
  }

  url(name: string): string {
    return `url(#${this.ref(name)})`;
  }

  definedIds(): string[] {
    return [...this.defined].map(n => this.resolve(n));
  }

  undefinedReferences(): string[] {
    return [...this.referenced].filter(n => !this.defined.has(n)).map(n => this.resolve(n));
  }
}

export function randomSuffix(): string {
  return randomBytes(3).toString('hex');
}

const SUFFIX_PATTERN = /^[A-Za-z0-9_-]+$/;

export function suffixFor(option: UniqueIdOption): string | undefined {
  if (option === false) return undefined;
  if (option === true) return randomSuffix();
  if (!SUFFIX_PATTERN.test(option)) {
    throw new ConfigurationError(
      'CFG-INVALID-OPTION',
      `Invalid unique id suffix: ${JSON.stringify(option)}`,
      'Use letters, digits, "-" or "_".'
    );
  }
  return option;
}
