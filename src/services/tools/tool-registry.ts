import type { RegisteredTool, ToolListing } from '../../types/mcp.js';

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  add(tool: RegisteredTool): void {
    this.tools.set(tool.listing.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getTool(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getListings(): ToolListing[] {
    return Array.from(this.tools.values()).map(tool => tool.listing);
  }

  get size(): number {
    return this.tools.size;
  }
}
