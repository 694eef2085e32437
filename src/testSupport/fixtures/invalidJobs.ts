export const jobs = {
  sum: 42,
};
