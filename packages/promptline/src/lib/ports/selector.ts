export interface SelectionRequest {
  label: string;
  options: readonly string[];
}

/**
 * Interactive list the user toggles entries in.
 * Rendering and key bindings belong to the implementation; callers only see
 * the labels that were chosen, in whatever order the list reports them.
 */
export interface ListSelector {
  select(request: SelectionRequest): Promise<string[]>;
}
