import { formatCard, formatCards, handValue } from '../games/blackjack/cards.js';
import type { Participant, RoundObserver } from '../games/blackjack/types.js';
import { c, ui } from './ui.js';

const points = (v: number) => `(${v.toFixed(1)} points)`;

/** Play-by-play of a round in the console. */
export function createNarrator(playerName: string): RoundObserver {
  const nameOf = (who: Participant) => (who === 'player' ? playerName : 'Dealer');
  return {
    draw(who, card, visible) {
      if (visible) ui.say(`${nameOf(who)} draws ${formatCard(card)}`);
    },
    action(who, action) {
      ui.say(`${nameOf(who)} does ${c.bold(action)}`);
    },
    split(who, hands) {
      ui.say(`${nameOf(who)} now has 2 hands`);
      hands.forEach((h, i) => ui.say(`Hand ${i + 1}: ${formatCards(h)}`));
    },
    handEnd(who, cards, label) {
      const suffix = label ? ` (${label})` : '';
      ui.say(`${nameOf(who)} ends with${suffix} ${formatCards(cards)} with value ${handValue(cards)}\n`);
    },
    dealerReveal(cards) {
      ui.say(`Dealer reveals: ${formatCard(cards[cards.length - 1])}`, 'dim');
      ui.say(`Dealer has: ${formatCards(cards)} ${points(handValue(cards))}`);
    },
    settle(result) {
      for (const hand of result.hands) {
        ui.say(`${playerName}: ${formatCards(hand.cards)} ${points(hand.value)}`);
        ui.say(`Dealer: ${formatCards(result.dealer)} ${points(handValue(result.dealer))}`);
      }
      const style = result.reward > 0 ? 'success' : result.reward < 0 ? 'warn' : 'plain';
      ui.say(`Bet: ${result.bet} won: ${result.reward}\n`, style);
    },
  };
}
