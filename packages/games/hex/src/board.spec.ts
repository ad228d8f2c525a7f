import { strict as assert } from "assert";
import { SeededRandom } from "@hexbridge/core";
import { Board, StoneMatrix } from "./board";
import { Color } from "./color";
import { CoordsOrEdge, EDGES, Edge, getColorOfEdge, isEdge } from "./edges";

// Hex adjacency as row/column offsets, independent of the neighbor enumerator
const HEX_OFFSETS: [number, number][] = [
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
];

function nodeKey(node: CoordsOrEdge): string {
  return isEdge(node) ? node : `${node.row},${node.column}`;
}

function colorOf(matrix: StoneMatrix, node: CoordsOrEdge): Color | null {
  return isEdge(node) ? getColorOfEdge(node) : matrix[node.row][node.column];
}

function adjacent(size: number, node: CoordsOrEdge): CoordsOrEdge[] {
  if (isEdge(node)) {
    const cells: CoordsOrEdge[] = [];
    for (let i = 0; i < size; i++) {
      if (node === "top") cells.push({ row: 0, column: i });
      if (node === "bottom") cells.push({ row: size - 1, column: i });
      if (node === "left") cells.push({ row: i, column: 0 });
      if (node === "right") cells.push({ row: i, column: size - 1 });
    }
    return cells;
  }

  const result: CoordsOrEdge[] = [];
  for (const [dr, dc] of HEX_OFFSETS) {
    const row = node.row + dr;
    const column = node.column + dc;
    if (row >= 0 && row < size && column >= 0 && column < size) {
      result.push({ row, column });
    }
  }
  if (node.row === 0) result.push("top");
  if (node.row === size - 1) result.push("bottom");
  if (node.column === 0) result.push("left");
  if (node.column === size - 1) result.push("right");
  return result;
}

/**
 * Label every node with its like-colored component using breadth-first
 * search: the ground truth for isInSameSet. Empty cells are singletons.
 */
function componentLabels(matrix: StoneMatrix): Map<string, number> {
  const labels = new Map<string, number>();
  let next = 0;

  for (const start of allNodes(matrix.length)) {
    if (labels.has(nodeKey(start))) continue;
    const label = next++;
    labels.set(nodeKey(start), label);
    const color = colorOf(matrix, start);
    if (color === null) continue;

    const queue: CoordsOrEdge[] = [start];
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      for (const neighbor of adjacent(matrix.length, node)) {
        const key = nodeKey(neighbor);
        if (labels.has(key) || colorOf(matrix, neighbor) !== color) continue;
        labels.set(key, label);
        queue.push(neighbor);
      }
    }
  }
  return labels;
}

function allNodes(size: number): CoordsOrEdge[] {
  const nodes: CoordsOrEdge[] = [...EDGES];
  for (let row = 0; row < size; row++) {
    for (let column = 0; column < size; column++) {
      nodes.push({ row, column });
    }
  }
  return nodes;
}

describe("Board", () => {
  describe("construction", () => {
    it("should start empty", () => {
      const board = new Board(3);
      assert.equal(board.size, 3);
      assert.equal(board.getColor({ row: 0, column: 0 }), null);
      assert.equal(board.getEmptyCells().length, 9);
    });

    it("should validate the size in create", () => {
      assert.deepEqual(Board.create(1), {
        ok: false,
        error: { kind: "SizeOutOfBounds", size: 1, min: 2, max: 19 },
      });
      assert.deepEqual(Board.create(20), {
        ok: false,
        error: { kind: "SizeOutOfBounds", size: 20, min: 2, max: 19 },
      });
      const created = Board.create(19);
      assert.ok(created.ok);
      assert.equal(created.value.size, 19);
    });

    it("should throw from the constructor for an unsupported size", () => {
      assert.throws(() => new Board(1), /between 2 and 19/);
    });

    it("should connect no edges on an empty board", () => {
      const board = new Board(4);
      assert.equal(board.isInSameSet("top", "bottom"), false);
      assert.equal(board.isInSameSet("left", "right"), false);
      assert.equal(board.isInSameSet("top", "left"), false);
    });
  });

  describe("play", () => {
    it("should place a stone", () => {
      const board = new Board(3);
      const result = board.play({ row: 1, column: 2 }, "black");
      assert.deepEqual(result, { ok: true, value: undefined });
      assert.equal(board.getColor({ row: 1, column: 2 }), "black");
    });

    it("should reject a row out of bounds", () => {
      const board = new Board(3);
      assert.deepEqual(board.play({ row: 3, column: 2 }, "black"), {
        ok: false,
        error: { kind: "OutOfBounds", coords: { row: 3, column: 2 } },
      });
    });

    it("should reject a column out of bounds", () => {
      const board = new Board(3);
      assert.deepEqual(board.play({ row: 0, column: 3 }, "white"), {
        ok: false,
        error: { kind: "OutOfBounds", coords: { row: 0, column: 3 } },
      });
    });

    it("should reject negative and fractional coords", () => {
      const board = new Board(3);
      const negative = board.play({ row: -1, column: 0 }, "black");
      const fractional = board.play({ row: 0.5, column: 0 }, "black");
      assert.equal(negative.ok, false);
      assert.equal(fractional.ok, false);
    });

    it("should reject an occupied cell regardless of color", () => {
      const board = new Board(3);
      const coords = { row: 1, column: 2 };
      board.play(coords, "black");
      assert.deepEqual(board.play(coords, "black"), {
        ok: false,
        error: { kind: "CellOccupied", coords },
      });
      assert.deepEqual(board.play(coords, "white"), {
        ok: false,
        error: { kind: "CellOccupied", coords },
      });
      assert.equal(board.getColor(coords), "black");
    });

    it("should leave the board untouched when a move is rejected", () => {
      const board = new Board(3);
      board.play({ row: 0, column: 0 }, "black");
      const before = board.toStoneMatrix();
      board.play({ row: 3, column: 3 }, "white");
      board.play({ row: 0, column: 0 }, "white");
      assert.deepEqual(board.toStoneMatrix(), before);
    });

    it("should connect a stone to its own edge only", () => {
      const board = new Board(3);
      board.play({ row: 0, column: 1 }, "black");
      assert.equal(board.isInSameSet({ row: 0, column: 1 }, "top"), true);
      assert.equal(board.isInSameSet({ row: 0, column: 1 }, "bottom"), false);

      board.play({ row: 1, column: 0 }, "white");
      assert.equal(board.isInSameSet({ row: 1, column: 0 }, "left"), true);
      assert.equal(board.isInSameSet({ row: 1, column: 0 }, "top"), false);
    });

    it("should connect black's edges through a column of stones", () => {
      const board = new Board(3);
      board.play({ row: 0, column: 1 }, "black");
      board.play({ row: 2, column: 1 }, "black");
      assert.equal(board.isInSameSet("top", "bottom"), false);

      board.play({ row: 1, column: 1 }, "black");
      assert.equal(board.isInSameSet("top", "bottom"), true);
      assert.equal(board.isInSameSet({ row: 0, column: 1 }, { row: 2, column: 1 }), true);
    });

    it("should not connect through an opponent stone", () => {
      const board = new Board(3);
      board.play({ row: 1, column: 0 }, "white");
      board.play({ row: 1, column: 1 }, "black");
      board.play({ row: 1, column: 2 }, "white");
      assert.equal(board.isInSameSet("left", "right"), false);
      assert.equal(board.isInSameSet({ row: 1, column: 0 }, { row: 1, column: 2 }), false);
    });

    it("should join groups that meet at the new stone", () => {
      // The new stone's left and top-left neighbors are both black; the
      // merge of the first must not hide the group of the others.
      const board = new Board(4);
      board.play({ row: 1, column: 0 }, "black");
      board.play({ row: 0, column: 1 }, "black");
      board.play({ row: 2, column: 1 }, "black");
      board.play({ row: 1, column: 2 }, "black");
      board.play({ row: 1, column: 1 }, "black");
      for (const other of [
        { row: 1, column: 0 },
        { row: 0, column: 1 },
        { row: 2, column: 1 },
        { row: 1, column: 2 },
      ]) {
        assert.equal(board.isInSameSet({ row: 1, column: 1 }, other), true);
      }
    });
  });

  describe("getEmptyCells", () => {
    it("should list the empty cells row by row", () => {
      const board = new Board(2);
      board.play({ row: 0, column: 1 }, "black");
      board.play({ row: 1, column: 0 }, "white");
      assert.deepEqual(board.getEmptyCells(), [
        { row: 0, column: 0 },
        { row: 1, column: 1 },
      ]);
    });

    it("should be empty on a full board", () => {
      const board = new Board(2);
      board.play({ row: 0, column: 0 }, "black");
      board.play({ row: 0, column: 1 }, "white");
      board.play({ row: 1, column: 0 }, "white");
      board.play({ row: 1, column: 1 }, "black");
      assert.deepEqual(board.getEmptyCells(), []);
    });
  });

  describe("findAttackedBridges", () => {
    it("should report the bridge attacked by the last stone", () => {
      const board = new Board(5);
      board.play({ row: 1, column: 3 }, "black");
      board.play({ row: 3, column: 2 }, "black");
      board.play({ row: 2, column: 2 }, "white");
      assert.deepEqual(board.findAttackedBridges({ row: 2, column: 2 }), [{ row: 2, column: 3 }]);
    });

    it("should report nothing for an empty cell", () => {
      const board = new Board(5);
      assert.deepEqual(board.findAttackedBridges({ row: 2, column: 2 }), []);
    });
  });

  describe("stone matrix", () => {
    const matrix: StoneMatrix = [
      [null, null, "black"],
      ["white", "black", "white"],
      ["black", null, null],
    ];

    it("should round-trip through fromStoneMatrix and toStoneMatrix", () => {
      const loaded = Board.fromStoneMatrix(matrix);
      assert.ok(loaded.ok);
      assert.deepEqual(loaded.value.toStoneMatrix(), matrix);
    });

    it("should rebuild the same connectivity as playing the stones", () => {
      const loaded = Board.fromStoneMatrix(matrix);
      assert.ok(loaded.ok);
      const board = loaded.value;
      assert.equal(board.isInSameSet({ row: 0, column: 2 }, { row: 2, column: 0 }), true);
      assert.equal(board.isInSameSet("top", "bottom"), true);
      assert.equal(board.isInSameSet({ row: 1, column: 0 }, "left"), true);
      assert.equal(board.isInSameSet({ row: 1, column: 0 }, { row: 1, column: 2 }), false);
      assert.equal(board.isInSameSet("left", "right"), false);
    });

    it("should reject a matrix that is too small or too large", () => {
      assert.deepEqual(Board.fromStoneMatrix([[null]]), {
        ok: false,
        error: { kind: "SizeOutOfBounds", size: 1, min: 2, max: 19 },
      });
      const tooLarge: StoneMatrix = Array.from({ length: 20 }, () =>
        Array<Color | null>(20).fill(null)
      );
      assert.deepEqual(Board.fromStoneMatrix(tooLarge), {
        ok: false,
        error: { kind: "SizeOutOfBounds", size: 20, min: 2, max: 19 },
      });
    });

    it("should name the first row with the wrong length", () => {
      assert.deepEqual(
        Board.fromStoneMatrix([
          [null, null, null],
          [null, null],
          [null, null, null, null],
        ]),
        { ok: false, error: { kind: "NotSquare", size: 3, rowIndex: 1 } }
      );
    });
  });

  describe("connectivity against breadth-first search", () => {
    for (const size of [2, 3, 5, 7]) {
      it(`should agree with BFS after every move on a ${size}x${size} board`, () => {
        const rng = new SeededRandom(size * 7919);
        const board = new Board(size);
        const matrix: StoneMatrix = Array.from({ length: size }, () =>
          Array<Color | null>(size).fill(null)
        );
        const moves = rng.shuffle(allNodes(size).filter((n) => !isEdge(n)));
        const nodes = allNodes(size);

        for (const move of moves) {
          if (isEdge(move)) continue;
          const color: Color = rng.nextInt(2) === 0 ? "black" : "white";
          assert.ok(board.play(move, color).ok);
          matrix[move.row][move.column] = color;

          const labels = componentLabels(matrix);
          for (const a of nodes) {
            for (const b of nodes) {
              assert.equal(
                board.isInSameSet(a, b),
                labels.get(nodeKey(a)) === labels.get(nodeKey(b)),
                `${nodeKey(a)} vs ${nodeKey(b)} after ${nodeKey(move)}`
              );
            }
          }
        }
      });
    }

    it("should keep edges of different colors apart on a full board", () => {
      const rng = new SeededRandom(42);
      const board = new Board(6);
      const edges: Edge[] = [...EDGES];
      for (let row = 0; row < 6; row++) {
        for (let column = 0; column < 6; column++) {
          board.play({ row, column }, rng.nextInt(2) === 0 ? "black" : "white");
        }
      }
      for (const a of edges) {
        for (const b of edges) {
          if (getColorOfEdge(a) !== getColorOfEdge(b)) {
            assert.equal(board.isInSameSet(a, b), false);
          }
        }
      }
      // no draws: exactly one side has connected
      assert.notEqual(board.isInSameSet("top", "bottom"), board.isInSameSet("left", "right"));
    });
  });
});
