/**
 * Cytoscape-style element lists for drawing rule sets and flows.
 * Read-only: built from copies returned by the public accessors.
 */

import type { Flow } from '../flow';
import type { RuleSet } from '../rule-set';

export type CytoscapeNode = {
  data: { id: string; label: string; [key: string]: string | boolean };
};

export type CytoscapeEdge = {
  data: { id: string; source: string; target: string };
};

export type CytoscapeElements = {
  nodes: CytoscapeNode[];
  edges: CytoscapeEdge[];
};

/**
 * `source->target` with both ids URI-encoded, so `>` never appears inside
 * either part and distinct pairs never share an id
 */
const edgeId = (source: string, target: string): string =>
  `${encodeURIComponent(source)}->${encodeURIComponent(target)}`;

/**
 * One node per rule, one edge per declared parent -> child pair.
 * Rule labels are the element ids.
 */
export function ruleSetToCytoscape(ruleSet: RuleSet): CytoscapeElements {
  return {
    nodes: ruleSet.rules.map((rule) => ({
      data: {
        id: rule.label,
        label: rule.displayName,
        allowsFork: rule.allowsFork,
      },
    })),
    edges: ruleSet.edges().map(([parent, child]) => ({
      data: {
        id: edgeId(parent.label, child.label),
        source: parent.label,
        target: child.label,
      },
    })),
  };
}

/**
 * One node per flow node (ids are flow node ids), one edge per flow edge
 */
export function flowToCytoscape(flow: Flow): CytoscapeElements {
  return {
    nodes: flow.nodes.map((node) => ({
      data: {
        id: node.id,
        label: node.ruleNode.displayName,
        rule: node.label,
        isStart: node.isStart,
      },
    })),
    edges: flow.edges.map(([parent, child]) => ({
      data: {
        id: edgeId(parent.id, child.id),
        source: parent.id,
        target: child.id,
      },
    })),
  };
}
