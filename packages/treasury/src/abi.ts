import { parseAbi } from "viem";

export const treasuryAbi = parseAbi([
  "function MAX_REDEMPTION_RATE() view returns (uint256)",
  "function redemptionRate() view returns (uint256)",
  "function membership() view returns (address)",
  "function totalTreasury() view returns (uint256)",
  "function allocatedTreasury() view returns (uint256)",
  "function calculateRedemption() view returns (uint256)",
  "function setRedemptionRate(uint256 rate)",
  "function redeemForETH(uint256 tokenId) returns (uint256)",
]);

/** The slice of the membership registry the executor calls. */
export const membershipAbi = parseAbi([
  "function totalSupply() view returns (uint256)",
  "function ownerOf(uint256 tokenId) view returns (address)",
  "function burn(uint256 tokenId)",
]);
