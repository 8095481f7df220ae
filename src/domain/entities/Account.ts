export interface Account {
  id: string;
  closed: boolean;
  description: string;
  type?: string;
  created?: string; // upstream timestamp text
  /** Remaining upstream fields, passed through for display. */
  metadata: Record<string, unknown>;
}
