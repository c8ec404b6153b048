/** One entry of the side-pane chat list. */
export interface ChatSummary {
  name: string;
  recentMessage: string;
  time: string;
  unreadCount: number;
  /**
   * Vertical offset of the virtualized list row. The list renders rows out of
   * DOM order, so this is what puts the most recent chat first.
   */
  offsetY: number;
}

/** A display name, or a prefix of one, typed into the chat search box. */
export type ContactIdentifier = string;
