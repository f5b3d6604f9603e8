export interface Result {
  timestamp?: Date;
  method?: string;
  body?: string;
  url?: string;
  source?: string;
  tag?: string;
  attribute?: string;
}

/** Structured (JSON) form of a Result. Keys are omitted when their value is empty. */
export interface ResultRecord {
  timestamp?: string;
  method?: string;
  body?: string;
  endpoint?: string;
  source?: string;
  tag?: string;
  attribute?: string;
}
