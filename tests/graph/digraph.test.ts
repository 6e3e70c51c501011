import { describe, it } from "mocha";
import { expect } from "chai";

import { Digraph } from "../../src/graph/digraph.js";
import { CapacityError, NullArgumentError, VertexNotFoundError } from "../../src/graph/errors.js";
import { ERROR_CODES } from "../../src/types.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

function buildGraph(edges: Array<[string, string]>): Digraph<string> {
  const graph = new Digraph<string>();
  for (const [from, to] of edges) {
    graph.addEdge(from, to);
  }
  return graph;
}

describe("Digraph", () => {
  describe("construction", () => {
    it("rejects negative capacity hints", () => {
      expect(() => new Digraph<string>({ initialCapacity: -1 })).to.throw(CapacityError);
    });

    it("rejects fractional capacity hints with a stable code", () => {
      try {
        new Digraph<string>({ initialCapacity: 2.5 });
        expect.fail("expected a CapacityError");
      } catch (error) {
        expect(error).to.be.instanceOf(CapacityError);
        if (error instanceof CapacityError) {
          expect(error.code).to.equal(ERROR_CODES.GRAPH_CAPACITY);
          expect(error.message).to.equal("initial capacity must be a non-negative integer (received 2.5)");
        }
      }
    });

    it("accepts a zero capacity hint", () => {
      const graph = new Digraph<string>({ initialCapacity: 0 });
      expect(graph.initialCapacity).to.equal(0);
      expect(graph.getSize()).to.equal(0);
    });
  });

  describe("mutation", () => {
    it("reports whether addVertex changed the graph", () => {
      const graph = new Digraph<string>();
      expect(graph.addVertex("a")).to.equal(true);
      expect(graph.addVertex("a")).to.equal(false);
      expect(graph.addVertex("b")).to.equal(true);
      expect(graph.getSize()).to.equal(2);
      expect(graph.getVertices()).to.deep.equal(["a", "b"]);
    });

    it("adds missing endpoints when adding an edge", () => {
      const graph = new Digraph<string>();
      expect(graph.addEdge("a", "b")).to.equal(true);
      expect(graph.hasVertex("a")).to.equal(true);
      expect(graph.hasVertex("b")).to.equal(true);
      expect(graph.getSize()).to.equal(2);
    });

    it("treats a missing head as addVertex on the tail", () => {
      const graph = new Digraph<string>();
      expect(graph.addEdge("a", null)).to.equal(true);
      expect(graph.addEdge("a", undefined)).to.equal(false);
      expect(graph.getSize()).to.equal(1);
      expect(graph.getEdges()).to.deep.equal([]);
    });

    it("keeps parallel edges", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["a", "b"],
      ]);
      expect(graph.getOutDegree("a")).to.equal(2);
      expect(graph.getInDegree("b")).to.equal(2);
      expect(graph.getEdgeCount()).to.equal(2);
      expect(graph.getEdges()).to.deep.equal([
        { from: "a", to: "b" },
        { from: "a", to: "b" },
      ]);
    });

    it("accepts self-loops and counts them in both degrees", () => {
      const graph = buildGraph([["a", "a"]]);
      expect(graph.getInDegree("a")).to.equal(1);
      expect(graph.getOutDegree("a")).to.equal(1);
      expect(graph.getSize()).to.equal(1);
    });

    it("rejects null vertices without mutating the graph", () => {
      const graph = new Digraph<string | null>();
      expect(() => graph.addVertex(null)).to.throw(NullArgumentError);
      expect(() => graph.addEdge(null, "b")).to.throw(NullArgumentError);
      expect(graph.getSize()).to.equal(0);
    });

    it("accepts falsy vertices other than null and undefined", () => {
      const graph = new Digraph<number>();
      graph.addEdge(0, 1);
      expect(graph.getVertices()).to.deep.equal([0, 1]);
    });
  });

  describe("queries", () => {
    it("lists edges by tail insertion order, then by edge insertion order", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["c", "a"],
        ["a", "c"],
      ]);
      expect(graph.getEdges()).to.deep.equal([
        { from: "a", to: "b" },
        { from: "a", to: "c" },
        { from: "c", to: "a" },
      ]);
    });

    it("exposes successors and predecessors with multiplicity", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["a", "b"],
        ["c", "b"],
      ]);
      expect(graph.getSuccessors("a")).to.deep.equal(["b", "b"]);
      expect(graph.getPredecessors("b")).to.deep.equal(["a", "a", "c"]);
      expect(graph.getSuccessors("b")).to.deep.equal([]);
    });

    it("throws VertexNotFoundError for unknown vertices", () => {
      const graph = buildGraph([["a", "b"]]);
      expect(() => graph.getInDegree("z")).to.throw(VertexNotFoundError, "vertex not found: z");
      expect(() => graph.getOutDegree("z")).to.throw(VertexNotFoundError);
      expect(() => graph.getSuccessors("z")).to.throw(VertexNotFoundError);
    });

    it("orders a diamond in reverse depth-first postorder", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["a", "c"],
        ["b", "d"],
        ["c", "d"],
      ]);
      expect(graph.getTopologicalOrder()).to.deep.equal(["a", "c", "b", "d"]);
      expect(graph.getCycle()).to.equal(null);
    });

    it("returns the cycle closed on its first vertex", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["b", "c"],
        ["c", "a"],
      ]);
      expect(graph.getCycle()).to.deep.equal(["a", "b", "c", "a"]);
      expect(graph.getTopologicalOrder()).to.equal(null);
    });

    it("starts the cycle at the target of the back edge", () => {
      const graph = buildGraph([
        ["x", "y"],
        ["y", "z"],
        ["z", "y"],
      ]);
      expect(graph.getCycle()).to.deep.equal(["y", "z", "y"]);
    });

    it("reports a self-loop as a two-element cycle", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["b", "b"],
      ]);
      expect(graph.getCycle()).to.deep.equal(["b", "b"]);
      expect(graph.getTopologicalOrder()).to.equal(null);
    });

    it("returns identical results for repeated queries", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["b", "a"],
      ]);
      const first = graph.getCycle();
      const second = graph.getCycle();
      expect(second).to.deep.equal(first);
      expect(second).to.not.equal(first);
    });

    it("recomputes the traversal after a mutation", () => {
      const graph = buildGraph([["a", "b"]]);
      expect(graph.getTopologicalOrder()).to.deep.equal(["a", "b"]);
      graph.addEdge("b", "a");
      expect(graph.getTopologicalOrder()).to.equal(null);
      expect(graph.getCycle()).to.deep.equal(["a", "b", "a"]);
    });

    it("orders long chains without exhausting the call stack", () => {
      const graph = new Digraph<number>();
      const length = 20_000;
      for (let index = 0; index < length - 1; index += 1) {
        graph.addEdge(index, index + 1);
      }
      const order = graph.getTopologicalOrder();
      expect(order).to.have.length(length);
      expect(order?.[0]).to.equal(0);
      expect(order?.[length - 1]).to.equal(length - 1);
    });

    it("logs a detected cycle once per traversal", () => {
      const logger = new RecordingLogger();
      const graph = new Digraph<string>({ logger });
      graph.addEdge("a", "b");
      graph.addEdge("b", "c");
      graph.addEdge("c", "a");

      graph.getCycle();
      graph.getTopologicalOrder();

      expect(logger.entries).to.deep.equal([
        { level: "debug", message: "digraph_cycle_detected", payload: { length: 3 } },
      ]);
    });
  });

  describe("clone", () => {
    it("shares no structure with the original", () => {
      const original = buildGraph([["a", "b"]]);
      const copy = original.clone();

      copy.addEdge("b", "c");
      original.addEdge("b", "a");

      expect(original.getSize()).to.equal(2);
      expect(copy.getSize()).to.equal(3);
      expect(copy.getCycle()).to.equal(null);
      expect(original.getCycle()).to.deep.equal(["a", "b", "a"]);
      expect(copy.getEdges()).to.deep.equal([
        { from: "a", to: "b" },
        { from: "b", to: "c" },
      ]);
    });

    it("keeps the capacity hint", () => {
      const copy = new Digraph<string>({ initialCapacity: 4 }).clone();
      expect(copy.initialCapacity).to.equal(4);
    });
  });

  describe("rendering", () => {
    it("lists each vertex with its successors", () => {
      const graph = buildGraph([
        ["a", "b"],
        ["a", "b"],
      ]);
      graph.addVertex("c");
      expect(graph.toString()).to.equal("a -> [b, b]\nb -> []\nc -> []");
    });

    it("formats non-string vertices", () => {
      const graph = new Digraph<number>();
      graph.addEdge(1, 2);
      expect(graph.toString()).to.equal("1 -> [2]\n2 -> []");
      expect(graph.render((vertex) => `#${vertex}`)).to.equal("#1 -> [#2]\n#2 -> []");
    });
  });
});
