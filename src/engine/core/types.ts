// Default board dimensions
export const BOARD_WIDTH = 10 as const;
export const BOARD_HEIGHT = 20 as const;

// Largest exponent a board cell can store (cells are a Uint8Array of exponents)
export const MAX_EXPONENT = 255 as const;

// Block values - positive powers of two, 2 and up
declare const CellValueBrand: unique symbol;
export type CellValue = number & { readonly [CellValueBrand]: true };

function isPowerOfTwoExponent(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) return false;
  const e = Math.log2(n);
  return Number.isInteger(e) && e <= MAX_EXPONENT;
}

// CellValue constructors and guards
export function createCellValue(value: number): CellValue {
  if (!isPowerOfTwoExponent(value)) {
    throw new Error(
      `CellValue must be a power of two >= 2, got ${String(value)}`,
    );
  }
  return value as CellValue;
}

export function isCellValue(n: unknown): n is CellValue {
  return typeof n === "number" && isPowerOfTwoExponent(n);
}

export function cellValueToExponent(v: CellValue): number {
  return Math.round(Math.log2(v));
}

export function exponentToCellValue(e: number): CellValue {
  return createCellValue(2 ** e);
}

export function doubleCellValue(v: CellValue): CellValue {
  return createCellValue(v * 2);
}

// Row-major storage of exponents; 0 = empty, 1 = 2, 2 = 4, ...
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(width: number, height: number): BoardCells {
  return new Uint8Array(width * height) as BoardCells;
}

export function copyBoardCells(cells: BoardCells): BoardCells {
  return new Uint8Array(cells) as BoardCells;
}

export type Board = {
  readonly width: number;
  readonly height: number;
  readonly cells: BoardCells;
};

// y = 0 is the bottom row
export function idx(board: Board, x: number, y: number): number {
  return y * board.width + x;
}

export type PlacedBlock = Readonly<{ x: number; y: number; value: CellValue }>;

// Pieces and rotation
export type Shape = "I" | "O" | "T" | "L" | "J" | "S" | "Z";
export type Rot = 0 | 1 | 2 | 3;

export const SHAPES: ReadonlyArray<Shape> = ["I", "O", "T", "L", "J", "S", "Z"];

export type Offset = readonly [number, number];
export type Offsets = readonly [Offset, Offset, Offset, Offset];

export type PieceShape = {
  id: Shape;
  cells: readonly [Offsets, Offsets, Offsets, Offsets];
};

// values[i] belongs to offset i in every rotation
export type BlockValues = readonly [CellValue, CellValue, CellValue, CellValue];

export type ActivePiece = {
  readonly id: Shape;
  readonly rot: Rot;
  readonly x: number;
  readonly y: number;
  readonly values: BlockValues;
};

export function nextRot(rot: Rot): Rot {
  switch (rot) {
    case 0:
      return 1;
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return 0;
  }
}
