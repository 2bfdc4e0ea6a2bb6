import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";

export interface TokenizerAdapter {
  countTokens(text: string): number;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export class TiktokenAdapter implements TokenizerAdapter {
  private readonly encoder: Tiktoken;

  constructor(encoding: TiktokenEncoding = "cl100k_base") {
    this.encoder = getEncoding(encoding);
  }

  countTokens(text: string): number {
    return this.encode(text).length;
  }

  // Special-token strings found in documents are encoded as plain text.
  encode(text: string): number[] {
    return this.encoder.encode(text, [], []);
  }

  decode(tokens: number[]): string {
    return this.encoder.decode(tokens);
  }
}
