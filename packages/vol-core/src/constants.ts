// Grid strike labelled ATM in the skew report when the caller names none
export const DEFAULT_ATM_STRIKE = 100;

// Relative tolerance when matching a surface strike to a grid strike
export const STRIKE_TOL_REL = 1e-9;

// Every skew column is (vol - ATM vol) / 20, whatever the strike's distance, 2dp
export const SKEW_DIVISOR = 20;
export const SKEW_DIGITS = 2;

// Collaborator params too heavy to persist
export const HEAVY_PARAM_KEYS: readonly string[] = ["yield_curve", "tables", "option_dict", "opt_list"];
