// Catppuccin Mocha palette, named by role in the list
export interface ThemeColors {
  primary: string;   // file links
  success: string;   // done
  warning: string;   // pending
  error: string;     // current-exercise marker
  dim: string;       // empty progress cells
  accent: string;    // footer messages, active filter
  surface: string;   // selected row background
}

export interface Theme {
  name: string;
  colors: ThemeColors;
  icons: {
    // Must be two columns wide: the list credits it with addToLen(2)
    selected: string;
    current: string;
    separator: string;
  };
  progress: {
    filled: string;
    empty: string;
  };
}

export const catppuccin: Theme = {
  name: "catppuccin",
  colors: {
    primary: "#89b4fa",   // blue
    success: "#a6e3a1",   // green
    warning: "#f9e2af",   // yellow
    error: "#f38ba8",     // red
    dim: "#585b70",       // surface2
    accent: "#cba6f7",    // mauve
    surface: "#313244",   // surface0
  },
  icons: {
    selected: "👉",
    current: ">>>>>>>",
    separator: "─",
  },
  progress: {
    filled: "█",
    empty: "░",
  },
};

// Active theme
export const theme = catppuccin;
export const C = theme.colors;
export const I = theme.icons;
