'use strict';

import _ from '../lodash-mixins';
import type Program from '../Program';
import type State from '../State';
import type { Instruction, TapeSymbol } from '../TransitionSpec';

import { forceSimulation, forceLink, forceManyBody, forceCenter } from 'd3-force';
import type { SimulationLinkDatum, SimulationNodeDatum } from 'd3-force';

export interface Vertex extends SimulationNodeDatum {
  label: string;
  isFinal: boolean;
}

// SimulationLinkDatum<NodeDatum extends SimulationNodeDatum>
export interface LayoutEdge extends SimulationLinkDatum<Vertex> {
  source: Vertex;
  target: Vertex;
  labels: string[];
  instructions: Instruction[];
}

interface VertexLUT {
  [state: string]: Vertex;
}

type Graph = { vertices: VertexLUT, edges: LayoutEdge[] };

/**
 * Derive the graph (vertices & edges) for a state diagram. Instructions with
 * the same source and target share one edge carrying all their labels, in
 * program order.
 */
function deriveGraph (program: Program): Graph {
  // We need two passes, since edges may point at vertices yet to be created.
  // 1. Create all the vertices.
  let vertices: VertexLUT = _.chain(program.states)
    .keyBy((s) => s.name)
    .mapValues((s): Vertex => ({ label: s.name, isFinal: s.isFinal }))
    .value();

  // 2. Create the edges, which can now point at any vertex object.
  let edges: LayoutEdge[] = [];
  let cache: { [key: string]: LayoutEdge } = {};
  function edgeTo (instruct: Instruction): LayoutEdge {
    let key = JSON.stringify([instruct.from.name, instruct.to.name]);
    return cache[key] ||
      _.tap(cache[key] = {
        source: vertices[instruct.from.name],
        target: vertices[instruct.to.name],
        labels: [],
        instructions: [],
      }, (edge) => edges.push(edge));
  }

  _.forEach(program.instructions, (instruct) => {
    let edge = edgeTo(instruct);
    edge.labels.push(labelFor(instruct, program.blank));
    edge.instructions.push(instruct);
  });

  return { vertices, edges };
}

function labelFor (trans: Instruction, blank: TapeSymbol): string {
  return visibleSpace(trans.read, blank) + '→' + visibleSpace(trans.write, blank) + ',' + trans.move;
}

// show a blank (and a literal space) as '␣'.
function visibleSpace (c: TapeSymbol, blank: TapeSymbol): string {
  return (c === ' ' || c === blank) ? '␣' : c;
}

/**
 * Aids rendering a program as a state diagram.
 *
 * • Generates the vertices and edges ("nodes" and "links") for a D3 diagram.
 * • Provides mapping of each state to its vertex and each state/symbol pair
 *   to the instruction and edge the machine would take.
 */
export default class StateGraph {
  private readonly program: Program;
  private readonly derived: Graph;

  constructor (program: Program) {
    this.program = program;
    this.derived = deriveGraph(program);
  }

  public getVertices (): Vertex[] {
    return _.values(this.derived.vertices);
  }

  public getVertexMap (): VertexLUT {
    return this.derived.vertices;
  }

  public getEdges (): LayoutEdge[] {
    return this.derived.edges;
  }

  public getVertex (state: State): Vertex | undefined {
    return this.derived.vertices[state.name];
  }

  /** The instruction `program.match` picks, and the edge it is drawn on. */
  public getInstructionAndEdge (state: State, symbol: TapeSymbol): { instruction: Instruction, edge: LayoutEdge } | undefined {
    if (this.getVertex(state) === undefined) {
      throw new Error('not a valid state: ' + String(state));
    }

    let instruction = this.program.match(state, symbol);
    if (instruction === undefined) return undefined;
    let edge = _.find(this.derived.edges, (e) => _.includes(e.instructions, instruction));
    return edge && { instruction, edge };
  }

  /**
   * Run a force layout for a fixed number of ticks, leaving `x`/`y` on every
   * vertex. The simulation is stopped, so nothing keeps running afterwards.
   */
  public layout (ticks: number = 300, width: number = 600, height: number = 400): Vertex[] {
    let nodes = this.getVertices();
    let simulation = forceSimulation<Vertex, LayoutEdge>(nodes)
      .force('link', forceLink<Vertex, LayoutEdge>(this.derived.edges).distance(80))
      .force('charge', forceManyBody<Vertex>())
      .force('center', forceCenter<Vertex>(width / 2, height / 2))
      .stop();
    _.times(ticks, () => simulation.tick());
    return nodes;
  }
}
