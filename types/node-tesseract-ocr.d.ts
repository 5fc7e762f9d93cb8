declare module 'node-tesseract-ocr' {
  export interface Config {
    lang?: string;
    oem?: number | string;
    psm?: number | string;
    binary?: string;
    presets?: string[];
    [option: string]: string | number | string[] | undefined;
  }

  export function recognize(input: string | string[] | Buffer, config?: Config): Promise<string>;
}
