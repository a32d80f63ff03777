import { SpintaxSyntaxError } from "@core/errors/app-errors";
import { RandomSource } from "@core/utils/random";

export const DEFAULT_MAX_SPINTAX_DEPTH = 10;

type SpintaxPart = string | SpintaxBlock;

interface SpintaxBlock {
  position: number;
  options: SpintaxPart[][];
}

interface ParsedSpintax {
  parts: SpintaxPart[];
  errors: string[];
}

const WEIGHT_SUFFIX = /:(\d+)$/;
// `{{first_name}}` and friends are merge tags, substituted after expansion.
const MERGE_TAG = /\{\{\s*[\w.]+\s*\}\}/y;

/**
 * Single-pass parser for `{a|b|{c|d}}` text. It never throws: problems are
 * collected so `validate` can report all of them at once.
 */
class SpintaxParser {
  private pos = 0;
  private readonly errors: string[] = [];
  private depthReported = false;

  constructor(
    private readonly text: string,
    private readonly maxDepth: number,
  ) {}

  parse(): ParsedSpintax {
    const parts = this.parseSequence(0);
    return { parts, errors: this.errors };
  }

  private parseSequence(depth: number): SpintaxPart[] {
    const parts: SpintaxPart[] = [];
    let literal = "";

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];

      if (ch === "{") {
        MERGE_TAG.lastIndex = this.pos;
        const tag = MERGE_TAG.exec(this.text);
        if (tag) {
          literal += tag[0];
          this.pos += tag[0].length;
          continue;
        }
        if (literal) {
          parts.push(literal);
          literal = "";
        }
        parts.push(this.parseBlock(depth + 1));
        continue;
      }

      if (depth > 0 && (ch === "|" || ch === "}")) {
        break;
      }

      if (ch === "}") {
        this.errors.push(`Unexpected '}' at position ${this.pos}`);
      }
      literal += ch;
      this.pos++;
    }

    if (literal) {
      parts.push(literal);
    }
    return parts;
  }

  private parseBlock(depth: number): SpintaxBlock {
    const position = this.pos;
    this.pos++;

    if (depth > this.maxDepth && !this.depthReported) {
      this.errors.push(`Nesting deeper than ${this.maxDepth} levels at position ${position}`);
      this.depthReported = true;
    }

    const options: SpintaxPart[][] = [];
    for (;;) {
      const option = this.parseSequence(depth);
      options.push(option);

      if (this.pos >= this.text.length) {
        this.errors.push(`Unclosed '{' at position ${position}`);
        break;
      }

      const delimiter = this.text[this.pos];
      this.pos++;
      if (delimiter === "}") {
        break;
      }
    }

    if (options.some((option) => option.length === 0)) {
      this.errors.push(`Empty option in block at position ${position}`);
    }

    return { position, options };
  }
}

export interface SpintaxExpanderOptions {
  random?: RandomSource;
  maxDepth?: number;
}

export class SpintaxExpander {
  private readonly random: RandomSource;
  private readonly maxDepth: number;

  constructor(options: SpintaxExpanderOptions = {}) {
    this.random = options.random ?? Math.random;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_SPINTAX_DEPTH;
  }

  static hasSpintax(text: string): boolean {
    return text.includes("{") || text.includes("}");
  }

  validate(text: string): string[] {
    if (!SpintaxExpander.hasSpintax(text)) {
      return [];
    }
    return new SpintaxParser(text, this.maxDepth).parse().errors;
  }

  /** Resolves every block to one uniformly chosen option. */
  expand(text: string, random: RandomSource = this.random): string {
    if (!SpintaxExpander.hasSpintax(text)) {
      return text;
    }
    return this.render(this.parseOrThrow(text), random, false);
  }

  /**
   * Like `expand`, but an option may end in `:weight` and is then chosen in
   * proportion to it. Options without a suffix weigh 1.
   */
  expandWeighted(text: string, random: RandomSource = this.random): string {
    if (!SpintaxExpander.hasSpintax(text)) {
      return text;
    }
    return this.render(this.parseOrThrow(text), random, true);
  }

  countVariations(text: string): number {
    if (!SpintaxExpander.hasSpintax(text)) {
      return 1;
    }
    return this.countSequence(this.parseOrThrow(text));
  }

  private parseOrThrow(text: string): SpintaxPart[] {
    const { parts, errors } = new SpintaxParser(text, this.maxDepth).parse();
    if (errors.length > 0) {
      throw new SpintaxSyntaxError(errors);
    }
    return parts;
  }

  private render(parts: SpintaxPart[], random: RandomSource, weighted: boolean): string {
    let output = "";
    for (const part of parts) {
      if (typeof part === "string") {
        output += part;
        continue;
      }
      const option = weighted
        ? this.pickWeighted(part.options, random)
        : part.options[Math.min(Math.floor(random() * part.options.length), part.options.length - 1)];
      output += this.render(option, random, weighted);
    }
    return output;
  }

  private pickWeighted(options: SpintaxPart[][], random: RandomSource): SpintaxPart[] {
    const weighted = options.map(splitWeight);
    const total = weighted.reduce((sum, option) => sum + option.weight, 0);

    if (total === 0) {
      const index = Math.min(Math.floor(random() * weighted.length), weighted.length - 1);
      return weighted[index].parts;
    }

    const target = random() * total;
    let cumulative = 0;
    for (const option of weighted) {
      cumulative += option.weight;
      if (target < cumulative) {
        return option.parts;
      }
    }
    // Floating point can leave target equal to total; take the last weighted option.
    const last = [...weighted].reverse().find((option) => option.weight > 0);
    return (last ?? weighted[weighted.length - 1]).parts;
  }

  private countSequence(parts: SpintaxPart[]): number {
    let count = 1;
    for (const part of parts) {
      if (typeof part !== "string") {
        count *= part.options.reduce((sum, option) => sum + this.countSequence(option), 0);
      }
    }
    return count;
  }
}

function splitWeight(option: SpintaxPart[]): { parts: SpintaxPart[]; weight: number } {
  const last = option[option.length - 1];
  if (typeof last !== "string") {
    return { parts: option, weight: 1 };
  }

  const match = WEIGHT_SUFFIX.exec(last);
  if (!match) {
    return { parts: option, weight: 1 };
  }

  const stripped = last.slice(0, match.index);
  const parts = stripped ? [...option.slice(0, -1), stripped] : option.slice(0, -1);
  return { parts, weight: Number.parseInt(match[1], 10) };
}
