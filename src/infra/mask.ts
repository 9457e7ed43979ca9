export function maskCustomerId(customerId: string): string {
  if (customerId.length < 4) {
    return "****";
  }
  return `${customerId.slice(0, 4)}${"*".repeat(customerId.length - 4)}`;
}

export function maskCardNumber(cardNumber: string): string {
  const digits = cardNumber.replace(/[\s-]/g, "");
  if (digits.length < 4) {
    return "****-****-****-****";
  }
  return `****-****-****-${digits.slice(-4)}`;
}
