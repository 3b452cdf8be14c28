import React from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { RandomSource, shuffle, systemRandom } from "./random";
import { MemoryRound, MemoryTile } from "./types";

export type MatchingBoardProps = {
  tiles: MemoryTile[];
  pairs: MemoryRound["pairs"];
  showSolution?: boolean;
};

// Runs inside the widget only: two tapped tiles match iff their data-pair-id is equal.
const TAP_SCRIPT = `
(function () {
  var selected = null;
  var seconds = 0;
  var timer = document.getElementById("time-value");
  var interval = setInterval(function () { seconds += 1; timer.textContent = String(seconds); }, 1000);
  var tiles = document.querySelectorAll(".tile");
  tiles.forEach(function (tile) {
    tile.addEventListener("click", function () {
      if (tile.classList.contains("correct")) return;
      if (!selected) { selected = tile; tile.classList.add("selected"); return; }
      if (selected === tile) { tile.classList.remove("selected"); selected = null; return; }
      var first = selected;
      first.classList.remove("selected");
      selected = null;
      if (first.dataset.pairId === tile.dataset.pairId) {
        first.classList.add("correct");
        tile.classList.add("correct");
        if (document.querySelectorAll(".tile:not(.correct)").length === 0) {
          clearInterval(interval);
          document.getElementById("status").textContent = "Gewonnen! Zeit: " + seconds + " Sekunden";
        }
      } else {
        tile.classList.add("wrong");
        setTimeout(function () { tile.classList.remove("wrong"); }, 600);
      }
    });
  });
})();
`;

const STYLE = `
body { font-family: Arial, sans-serif; margin: 0; padding: 10px; background: #f6f7fb; }
.board { display: grid; grid-template-columns: repeat(auto-fill, minmax(130px, 1fr)); gap: 10px; }
.tile { background: white; border: 2px solid #2196f3; border-radius: 10px; padding: 10px; cursor: pointer; }
.tile.selected { background: #e3f2fd; }
.tile.correct { background: #4caf50; border-color: #4caf50; color: white; cursor: default; }
.tile.wrong { border-color: #e53935; }
`;

export function MatchingBoard({ tiles, pairs, showSolution = false }: MatchingBoardProps) {
  return (
    <div className="matching">
      <div id="timer">
        Zeit: <span id="time-value">0</span> Sekunden
      </div>
      <div className="board">
        {tiles.map((tile) => (
          <button key={tile.tileId} type="button" className="tile" data-pair-id={tile.pairId} lang={tile.lang}>
            {tile.text}
          </button>
        ))}
      </div>
      <p id="status" />
      {showSolution && (
        <table className="solution">
          <thead>
            <tr>
              <th>Deutsch</th>
              <th>Lösung</th>
            </tr>
          </thead>
          <tbody>
            {pairs.map((pair) => (
              <tr key={pair.pairId}>
                <td>{pair.de}</td>
                <td>{pair.en}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}

export function renderMatchingBoard(
  round: MemoryRound,
  options: { random?: RandomSource; showSolution?: boolean } = {}
): string {
  const tiles = shuffle(round.tiles, options.random ?? systemRandom);
  const page = (
    <html lang="de">
      <head>
        <meta charSet="UTF-8" />
        <style dangerouslySetInnerHTML={{ __html: STYLE }} />
      </head>
      <body>
        <MatchingBoard tiles={tiles} pairs={round.pairs} showSolution={options.showSolution} />
        <script dangerouslySetInnerHTML={{ __html: TAP_SCRIPT }} />
      </body>
    </html>
  );
  return `<!DOCTYPE html>${renderToStaticMarkup(page)}`;
}
