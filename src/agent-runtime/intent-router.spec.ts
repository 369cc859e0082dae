import { routeMessage } from './intent-router';

const KNOWN = ['AAPL', 'MSFT', 'GOOGL', 'AMZN', 'TSLA', 'NVDA', 'META'];

describe('routeMessage', () => {
  it.each([
    ['Convert 1000 USD to EUR', 'currency'],
    ['How much is 500 GBP in JPY?', 'currency'],
    ['convert that to PKR', 'currency'],
    ['Calculate my returns: invested $10000, now worth $15000 over 3 years', 'portfolio'],
    ['Analyze 100 shares of AAPL bought at $150', 'portfolio'],
    ['My portfolio has beta 1.2 and volatility 20%', 'portfolio'],
    ["What's the latest market news?", 'news'],
    ['Latest cryptocurrency news and trends', 'news'],
    ['Give me recent tech sector updates', 'news'],
    ['What is the price of AAPL?', 'stock'],
    ['TSLA?', 'stock'],
    ['How is Tesla doing today', 'stock'],
    ["What's happening in the markets?", 'news'],
    ['hello there', 'triage'],
  ])('should route "%s" to %s', (text, expected) => {
    expect(routeMessage(text, KNOWN)).toBe(expected);
  });
});
