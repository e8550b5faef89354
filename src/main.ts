// Headless demo: plays one seeded game with a naive input script and
// prints the final HUD. Usage: main [settings.json] [highscore.json]

import { loadSettings } from "./app/settings";
import { nextInt } from "./engine/core/rng/draw";
import { createSeededRng } from "./engine/core/rng/seeded";
import { selectHud } from "./engine/selectors";
import { FileHighScoreStore } from "./runtime/high-score";
import { GameSession } from "./runtime/session";

const FRAME_MS = 1000 / 60;
const MAX_SIMULATED_MS = 10 * 60 * 1000;

function main(argv: ReadonlyArray<string>): void {
  const settingsPath = argv[0];
  const storePath = argv[1] ?? ".mergefall-highscore.json";
  const config = settingsPath !== undefined ? loadSettings(settingsPath) : {};

  const session = new GameSession({
    config,
    store: new FileHighScoreStore(storePath),
  });
  session.start();

  // Shift each new piece to a random column, then drop it
  let rng = createSeededRng("demo-input");
  let elapsed = 0;
  while (session.lifecycle === "playing" && elapsed < MAX_SIMULATED_MS) {
    const events = session.advance(FRAME_MS);
    elapsed += FRAME_MS;

    for (const e of events) {
      if (e.kind === "PowerUpCollected") session.requestPowerUp();
      if (e.kind !== "PieceSpawned") continue;
      const pick = nextInt(rng, 9);
      rng = pick.newRng;
      const shift = pick.value - 4;
      for (let i = 0; i < Math.abs(shift); i++) {
        session.requestMove(shift < 0 ? "left" : "right");
      }
      session.requestHardDrop();
    }
  }

  const hud = selectHud(session.state);
  console.log(
    `score=${String(hud.score)} high=${String(hud.highScore)} ` +
      `level=${String(hud.level)} lines=${String(hud.lines)} ` +
      `pieces=${String(session.state.piecesLocked)}`,
  );
}

main(process.argv.slice(2));
