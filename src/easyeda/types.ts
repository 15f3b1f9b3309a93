/**
 * EasyEDA component API shapes.
 */

/**
 * Symbol payload. `dataStr` arrives either as a JSON string or already
 * decoded; `shape` holds the tilde-delimited drawing elements.
 */
export interface EasyedaComponent {
  uuid?: string;
  title?: string;
  dataStr?: unknown;
}

export interface EasyedaResponse {
  success?: boolean;
  code?: number;
  message?: string;
  result?: EasyedaComponent | null;
}
