import { Observation } from "./observation";
import { ChatMessage, Step } from "./step";

/**
 * One executed (or executing) step.
 * `observation` is filled in when the step finishes.
 */
export interface HistoryNode {
  step: Step;
  observation?: Observation;
  /**
   * 0 for steps run by the Autopilot directly, +1 for each level of
   * `sdk.runStep` nesting.
   */
  depth: number;
  active: boolean;
}

export interface HistoryNodeSnapshot {
  index: number;
  name: string;
  description: string;
  hidden: boolean;
  depth: number;
  active: boolean;
  observation?: Observation;
  chatContext: ChatMessage[];
}

export interface HistorySnapshot {
  currentIndex: number;
  timeline: HistoryNodeSnapshot[];
}

/**
 * What steps may see of the History: everything except appending.
 */
export interface ReadonlyHistory {
  readonly timeline: readonly HistoryNode[];
  readonly currentIndex: number;
  readonly length: number;
  getCurrent(): HistoryNode | undefined;
  toChatHistory(): ChatMessage[];
  snapshot(): HistorySnapshot;
}

/**
 * Ordered record of executed steps. Nodes are only ever appended.
 */
export class History implements ReadonlyHistory {
  private nodes: HistoryNode[] = [];
  private current = -1;

  get timeline(): readonly HistoryNode[] {
    return this.nodes;
  }

  get currentIndex(): number {
    return this.current;
  }

  get length(): number {
    return this.nodes.length;
  }

  addNode(node: HistoryNode): number {
    this.nodes.push(node);
    this.current = this.nodes.length - 1;
    return this.current;
  }

  getCurrent(): HistoryNode | undefined {
    return this.current >= 0 ? this.nodes[this.current] : undefined;
  }

  /**
   * Chat transcript: the chat context of every visible step, in order.
   */
  toChatHistory(): ChatMessage[] {
    const messages: ChatMessage[] = [];
    for (const node of this.nodes) {
      if (!node.step.hidden) {
        messages.push(...node.step.chatContext);
      }
    }
    return messages;
  }

  snapshot(): HistorySnapshot {
    return {
      currentIndex: this.current,
      timeline: this.nodes.map((node, index) => ({
        index,
        name: node.step.name,
        description: node.step.describe(),
        hidden: node.step.hidden,
        depth: node.depth,
        active: node.active,
        observation: node.observation,
        chatContext: [...node.step.chatContext],
      })),
    };
  }
}
