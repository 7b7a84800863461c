declare module 'fit-file-parser' {
  export interface FitParserOptions {
    force?: boolean;
    speedUnit?: 'm/s' | 'mph' | 'km/h';
    lengthUnit?: 'm' | 'mi' | 'km';
    temperatureUnit?: 'celsius' | 'kelvin' | 'fahrenheit';
    elapsedRecordField?: boolean;
    mode?: 'list' | 'cascade' | 'both';
  }

  export default class FitParser {
    constructor(options?: FitParserOptions);
    parse(content: Buffer | ArrayBuffer, callback: (error: unknown, data: unknown) => void): void;
  }
}
