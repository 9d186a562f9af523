/** Resolves for everyone once `parties` callers have arrived. */
export function barrier(parties: number): () => Promise<void> {
  let arrived = 0;
  let open: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });

  return async () => {
    arrived += 1;
    if (arrived >= parties) open();
    await gate;
  };
}
