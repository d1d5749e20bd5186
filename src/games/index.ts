export {
  ro_sham_bo,
  new_ro_sham_bo,
  compare_choices,
  describe_outcome,
} from './ro_sham_bo';
export type { Choice, RoShamBoGame, RoShamBoOutcome } from './ro_sham_bo';
export {
  tic_tac_toe,
  new_tic_tac_toe,
  take_turn,
  check_outcome,
  check_line,
  all_lines,
  line_positions,
  BOARD_SIZE,
} from './tic_tac_toe';
export type { Player, Pos, Line, TicTacToeEvent, TicTacToeOutcome, TicTacToeGame } from './tic_tac_toe';
