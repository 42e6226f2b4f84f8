// bidi-js ships no type declarations and has no @types package.
declare module 'bidi-js' {
  export interface EmbeddingLevelsResult {
    paragraphs: Array<{ start: number; end: number; level: number }>;
    levels: Uint8Array;
  }

  export interface Bidi {
    getEmbeddingLevels(text: string, explicitDirection?: 'ltr' | 'rtl'): EmbeddingLevelsResult;
    getReorderSegments(
      text: string,
      embeddingLevels: EmbeddingLevelsResult,
      start?: number,
      end?: number
    ): Array<[number, number]>;
    getMirroredCharactersMap(
      text: string,
      embeddingLevels: EmbeddingLevelsResult,
      start?: number,
      end?: number
    ): Map<number, string>;
  }

  export default function bidiFactory(): Bidi;
}
