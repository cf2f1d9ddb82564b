/**
 * Read-only views of instance histories.
 */

import type { InstanceRegistry } from "./registry.js";

export interface HistoryEntry {
  /** Role, uppercased for display. */
  role: string;
  content: string;
}

export interface InstanceHistory {
  id: string;
  entries: HistoryEntry[];
}

export class HistoryReporter {
  constructor(private registry: InstanceRegistry) {}

  render(id: string): HistoryEntry[] {
    return this.registry.resolve(id).context.map((m) => ({
      role: m.role.toUpperCase(),
      content: m.content,
    }));
  }

  /** Not isolated from instances added or removed while it runs. */
  renderAll(): InstanceHistory[] {
    return this.registry.listInstances().map((id) => ({ id, entries: this.render(id) }));
  }

  formatTranscript(id: string): string[] {
    return [
      `--- CONVERSATION HISTORY FOR '${id}' ---`,
      ...this.render(id).map((e) => `${e.role}: ${e.content}`),
      "--- END CONVERSATION ---",
    ];
  }

  formatAllTranscripts(): string[] {
    const lines: string[] = [];
    for (const id of this.registry.listInstances()) {
      if (lines.length > 0) lines.push("");
      lines.push(...this.formatTranscript(id));
    }
    return lines;
  }
}
