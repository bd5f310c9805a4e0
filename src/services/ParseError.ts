
export class ParseError extends Error {
  public readonly source: string;

  public readonly row?: number;

  constructor(message: string, source: string, row?: number) {
    super(row !== undefined ? `${source} row ${row}: ${message}` : `${source}: ${message}`);
    this.name = 'ParseError';
    this.source = source;
    this.row = row;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}
