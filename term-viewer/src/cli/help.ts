import { VERSION } from "../version.js";

const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export function helpText(): string {
  return `${BOLD}termol${RESET} v${VERSION}: view protein structures and meshes in your terminal

${BOLD}Usage${RESET}:
    termol <PDB_ID>                  Fetch and view a structure from RCSB PDB
    termol <file.pdb|file.cif>       View a local structure file
    termol <file.obj>                View an OBJ mesh
    termol <ID> --chain <CHAIN>      Show one chain only
    termol search <QUERY>            Search RCSB PDB
    termol cache                     Show cache info
    termol cache clear               Remove cached files

${BOLD}Options${RESET}:
    -c, --color <SCHEME>   Color scheme (default: coolwarm)
    -n, --chain <CHAIN>    Show only the given chain (e.g., A, B)
    -m, --mode <MODE>      Glyphs: braille (default), block, quadrant
    -b, --by <SOURCE>      Color by: attribute (default), depth, blend
    -w, --wireframe        Draw triangle outlines instead of filling them
    -v, --verbose          Print model statistics and warnings
    -h, --help             Show this help message
    -V, --version          Show version information

${BOLD}Color Schemes${RESET}:
    coolwarm     Blue to red diverging (default)
    rainbow      N-to-C terminal rainbow
    blues, greens, reds, oranges, purples
                 Sequential single-hue gradients
    viridis      Perceptually uniform (blue-green-yellow)
    plasma       Purple to yellow
    magma        Black to white via purple
    inferno      Black to yellow via red
    spectral     Spectral rainbow
    white        White monochrome

${BOLD}Controls${RESET}:
    Mouse drag         Rotate around the model (disables auto-rotate)
    Shift + drag       Pan the view
    Scroll up/down     Zoom in/out
    Arrow keys         Pan the view
    [+] / [-]          Zoom in/out
    [r]                Toggle auto-rotation
    [c]                Cycle through color schemes
    [m]                Cycle through glyph modes
    [0]                Reset view
    [q], Esc, Ctrl+C   Quit

${BOLD}Environment${RESET}:
    TERMOL_CACHE_DIR   Cache directory (default: $XDG_CACHE_HOME/termol or ~/.cache/termol)
    TERMOL_PYMOL       PyMOL executable (default: pymol)

Cartoon rendering needs PyMOL. Without it, .pdb files and PDB IDs are drawn
as a backbone trace.
`;
}

export function versionText(): string {
  return `termol v${VERSION}`;
}
