import { getEncoding, type Tiktoken } from "js-tiktoken";

export interface Tokenizer {
  count(text: string): number;
}

let cl100k: Tiktoken | null = null;

/** cl100k_base byte-pair encoding; the rank table ships with js-tiktoken. */
export class TiktokenTokenizer implements Tokenizer {
  count(text: string): number {
    if (!text) return 0;
    cl100k ??= getEncoding("cl100k_base");
    // special-token literals inside documents are counted as plain text
    return cl100k.encode(text, [], []).length;
  }
}

export const defaultTokenizer: Tokenizer = new TiktokenTokenizer();
