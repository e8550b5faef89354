import type {
  ActivePiece,
  Offsets,
  PieceShape,
  PlacedBlock,
  Shape,
} from "./types";

// Offsets are [dx, dy] from the anchor, y pointing up
const I_FLAT: Offsets = [
  [-1, 0],
  [0, 0],
  [1, 0],
  [2, 0],
];
const I_TALL: Offsets = [
  [0, -1],
  [0, 0],
  [0, 1],
  [0, 2],
];
const O_ALL: Offsets = [
  [0, 0],
  [1, 0],
  [0, 1],
  [1, 1],
];
const S_FLAT: Offsets = [
  [0, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
];
const S_TALL: Offsets = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, -1],
];
const Z_FLAT: Offsets = [
  [-1, 0],
  [0, 0],
  [0, 1],
  [1, 1],
];
const Z_TALL: Offsets = [
  [1, 0],
  [1, 1],
  [0, 1],
  [0, 2],
];

export const PIECES: Readonly<Record<Shape, PieceShape>> = {
  I: { cells: [I_FLAT, I_TALL, I_FLAT, I_TALL], id: "I" },
  J: {
    cells: [
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [-1, 1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [1, 1],
      ],
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [1, -1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [-1, -1],
      ],
    ],
    id: "J",
  },
  L: {
    cells: [
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [1, 1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [1, -1],
      ],
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [-1, -1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [-1, 1],
      ],
    ],
    id: "L",
  },
  O: { cells: [O_ALL, O_ALL, O_ALL, O_ALL], id: "O" },
  S: { cells: [S_FLAT, S_TALL, S_FLAT, S_TALL], id: "S" },
  T: {
    cells: [
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [0, 1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [1, 0],
      ],
      [
        [-1, 0],
        [0, 0],
        [1, 0],
        [0, -1],
      ],
      [
        [0, -1],
        [0, 0],
        [0, 1],
        [-1, 0],
      ],
    ],
    id: "T",
  },
  Z: { cells: [Z_FLAT, Z_TALL, Z_FLAT, Z_TALL], id: "Z" },
};

// Absolute cells of a piece, in offset order, carrying each block's value
export function pieceBlocks(piece: ActivePiece): ReadonlyArray<PlacedBlock> {
  const offsets = PIECES[piece.id].cells[piece.rot];
  return offsets.map(([dx, dy], i) => ({
    value: piece.values[i] ?? piece.values[0],
    x: piece.x + dx,
    y: piece.y + dy,
  }));
}
