export default {
  solve: () => ({
    displacement: [0, 0, 0],
    gradient: [
      [0, 0, 0],
      [0, 0, 0],
      [0, 0, 0],
    ],
  }),
};
