import { strict as assert } from "assert";
import { CoordsOrEdge } from "./edges";
import { HexCells } from "./hexCells";
import { getNeighbors } from "./neighbors";

const cells = new HexCells(5);

function neighborsOf(row: number, column: number): CoordsOrEdge[] {
  const index = cells.indexFromCoords({ row, column });
  return [...getNeighbors(cells, index)].map((n) => cells.decodeIndex(n));
}

const c = (row: number, column: number): CoordsOrEdge => ({ row, column });

describe("getNeighbors", () => {
  it("should list all six interior neighbors clockwise from the left", () => {
    assert.deepEqual(neighborsOf(2, 2), [c(2, 1), c(1, 2), c(1, 3), c(2, 3), c(3, 2), c(3, 1)]);
  });

  describe("top-left corner", () => {
    it("should have two cells and two edges in the corner", () => {
      assert.deepEqual(neighborsOf(0, 0), ["left", "top", c(0, 1), c(1, 0)]);
    });

    it("should substitute the top edge next to the corner", () => {
      assert.deepEqual(neighborsOf(0, 1), [c(0, 0), "top", c(0, 2), c(1, 1), c(1, 0)]);
    });

    it("should substitute the left edge below the corner", () => {
      assert.deepEqual(neighborsOf(1, 0), ["left", c(0, 0), c(0, 1), c(1, 1), c(2, 0)]);
    });
  });

  describe("top-right corner", () => {
    it("should have five neighbors in the obtuse corner", () => {
      assert.deepEqual(neighborsOf(0, 4), [c(0, 3), "top", "right", c(1, 4), c(1, 3)]);
    });

    it("should substitute the top edge next to the corner", () => {
      assert.deepEqual(neighborsOf(0, 3), [c(0, 2), "top", c(0, 4), c(1, 3), c(1, 2)]);
    });

    it("should substitute the right edge below the corner", () => {
      assert.deepEqual(neighborsOf(1, 4), [c(1, 3), c(0, 4), "right", c(2, 4), c(2, 3)]);
    });
  });

  describe("bottom-left corner", () => {
    it("should have five neighbors in the obtuse corner", () => {
      assert.deepEqual(neighborsOf(4, 0), ["left", c(3, 0), c(3, 1), c(4, 1), "bottom"]);
    });

    it("should substitute the left edge above the corner", () => {
      assert.deepEqual(neighborsOf(3, 0), ["left", c(2, 0), c(2, 1), c(3, 1), c(4, 0)]);
    });

    it("should substitute the bottom edge next to the corner", () => {
      assert.deepEqual(neighborsOf(4, 1), [c(4, 0), c(3, 1), c(3, 2), c(4, 2), "bottom"]);
    });
  });

  describe("bottom-right corner", () => {
    it("should have two cells and two edges in the corner", () => {
      assert.deepEqual(neighborsOf(4, 4), [c(4, 3), c(3, 4), "right", "bottom"]);
    });

    it("should substitute the right edge above the corner", () => {
      assert.deepEqual(neighborsOf(3, 4), [c(3, 3), c(2, 4), "right", c(4, 4), c(4, 3)]);
    });

    it("should substitute the bottom edge next to the corner", () => {
      assert.deepEqual(neighborsOf(4, 3), [c(4, 2), c(3, 3), c(3, 4), c(4, 4), "bottom"]);
    });
  });

  it("should count 6 inside, 5 on the sides and obtuse corners, 4 on the acute corners", () => {
    const size = cells.size;
    for (let row = 0; row < size; row++) {
      for (let column = 0; column < size; column++) {
        const onSide = row === 0 || column === 0 || row === size - 1 || column === size - 1;
        const acute =
          (row === 0 && column === 0) || (row === size - 1 && column === size - 1);
        const expected = acute ? 4 : onSide ? 5 : 6;
        assert.equal(neighborsOf(row, column).length, expected, `cell ${row},${column}`);
      }
    }
  });

  it("should restart from the beginning on every call", () => {
    const index = cells.indexFromCoords({ row: 2, column: 2 });
    const first = [...getNeighbors(cells, index)];
    const second = [...getNeighbors(cells, index)];
    assert.deepEqual(first, second);
  });

  it("should work on the smallest board", () => {
    const tiny = new HexCells(2);
    const neighbors = [...getNeighbors(tiny, tiny.indexFromCoords({ row: 0, column: 1 }))];
    assert.deepEqual(
      neighbors.map((n) => tiny.decodeIndex(n)),
      [c(0, 0), "top", "right", c(1, 1), c(1, 0)]
    );
  });

  it("should refuse an edge index", () => {
    assert.throws(() => [...getNeighbors(cells, cells.indexFromEdge("top"))], /not a cell/);
  });
});
