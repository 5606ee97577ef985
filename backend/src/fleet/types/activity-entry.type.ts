export interface ActivityEntry {
  timestamp: string;
  action: string;
  success: boolean;
  details: string;
  content_preview: string;
}

export interface ActivityReport {
  action?: string;
  success?: boolean;
  details?: string;
  content_preview?: unknown;
}
