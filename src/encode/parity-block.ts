/**
 * Parity-augmented block of nucleotides
 *
 * Layout (dataRows x dataCols data region plus one parity row and column):
 *
 *   d d d d | r      r = row parity (sum of the row mod 4)
 *   d d d d | r
 *   --------+--
 *   c c c c | x      c = column parity, x = corner (sum of all data mod 4)
 *
 * Cells are stored as character codes in a flat buffer with a stride of
 * `totalCols`. Any single-byte character can be written so that corruption
 * can be simulated; the corrector decides what is valid.
 */

export type CellRegion = 'data' | 'row_parity' | 'column_parity' | 'corner';

export class ParityBlock {
  readonly totalRows: number;
  readonly totalCols: number;
  private readonly cells: Uint8Array;

  constructor(totalRows: number, totalCols: number, cells?: Uint8Array) {
    if (!Number.isInteger(totalRows) || !Number.isInteger(totalCols) || totalRows < 1 || totalCols < 1) {
      throw new RangeError(`Invalid block dimensions: ${totalRows}x${totalCols}`);
    }
    const size = totalRows * totalCols;
    if (cells && cells.length !== size) {
      throw new RangeError(`Cell buffer has ${cells.length} entries, expected ${size}`);
    }

    this.totalRows = totalRows;
    this.totalCols = totalCols;
    this.cells = cells ? cells.slice() : new Uint8Array(size);
  }

  /**
   * Build a block from raw text rows, kept verbatim
   */
  static fromRows(rows: readonly string[]): ParityBlock {
    if (rows.length === 0) {
      throw new RangeError('Block needs at least one row');
    }
    const width = rows[0].length;
    const block = new ParityBlock(rows.length, width);

    rows.forEach((row, i) => {
      if (row.length !== width) {
        throw new RangeError(`Row ${i} has ${row.length} cells, expected ${width}`);
      }
      for (let j = 0; j < width; j++) {
        block.set(i, j, row[j]);
      }
    });

    return block;
  }

  get dataRows(): number {
    return this.totalRows - 1;
  }

  get dataCols(): number {
    return this.totalCols - 1;
  }

  /**
   * Character at (row, col)
   */
  get(row: number, col: number): string {
    return String.fromCharCode(this.cells[this.offset(row, col)]);
  }

  /**
   * Raw character code at (row, col)
   */
  code(row: number, col: number): number {
    return this.cells[this.offset(row, col)];
  }

  /**
   * Overwrite one cell with a single character
   */
  set(row: number, col: number, symbol: string): void {
    if (symbol.length !== 1 || symbol.charCodeAt(0) > 0xFF) {
      throw new RangeError(`Cell value must be a single-byte character, got "${symbol}"`);
    }
    this.cells[this.offset(row, col)] = symbol.charCodeAt(0);
  }

  /**
   * Which part of the augmented layout a cell belongs to
   */
  regionOf(row: number, col: number): CellRegion {
    this.offset(row, col);
    const parityRow = row === this.dataRows;
    const parityCol = col === this.dataCols;
    if (parityRow && parityCol) return 'corner';
    if (parityRow) return 'column_parity';
    if (parityCol) return 'row_parity';
    return 'data';
  }

  /**
   * Full row including its parity cell
   */
  row(row: number): string {
    const start = this.offset(row, 0);
    let text = '';
    for (let col = 0; col < this.totalCols; col++) {
      text += String.fromCharCode(this.cells[start + col]);
    }
    return text;
  }

  rows(): string[] {
    return Array.from({ length: this.totalRows }, (_, i) => this.row(i));
  }

  /**
   * Data region rows, without parity
   */
  dataSequences(): string[] {
    return Array.from({ length: this.dataRows }, (_, i) => this.row(i).slice(0, this.dataCols));
  }

  clone(): ParityBlock {
    return new ParityBlock(this.totalRows, this.totalCols, this.cells);
  }

  equals(other: ParityBlock): boolean {
    if (other.totalRows !== this.totalRows || other.totalCols !== this.totalCols) {
      return false;
    }
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  private offset(row: number, col: number): number {
    if (!Number.isInteger(row) || !Number.isInteger(col) ||
        row < 0 || row >= this.totalRows || col < 0 || col >= this.totalCols) {
      throw new RangeError(`Cell (${row}, ${col}) outside ${this.totalRows}x${this.totalCols} block`);
    }
    return row * this.totalCols + col;
  }
}
