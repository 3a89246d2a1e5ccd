export const NAME = 'refine-mcts';
export const VERSION = '0.1.0';
