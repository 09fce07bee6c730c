const currencyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

export function roundCurrency(amount: number) {
  return Number(amount.toFixed(2));
}

export function formatCurrency(amount: number) {
  return currencyFormatter.format(amount);
}

export function formatFactor(factor: number) {
  return `${factor.toFixed(2)}x`;
}

export function titleCase(value: string) {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}
