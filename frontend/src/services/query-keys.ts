export const queryKeys = {
  hello: ["hello"] as const,
};
