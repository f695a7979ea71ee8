/**
 * Fungible Asset Ledger
 *
 * ERC20-style balances and allowances for any number of asset kinds, keyed by
 * asset id. The pool consumes the `FungibleLedger` contract; `InMemoryLedger`
 * is the reference implementation used by the tests and by embedders that do
 * not bring their own.
 */

import { MAX_UINT256 } from "./constants";

/**
 * Ledger contract consumed by the pool engine
 */
export interface FungibleLedger {
  balanceOf(asset: string, holder: string): bigint;
  allowance(asset: string, owner: string, spender: string): bigint;
  totalSupply(asset: string): bigint;
  /** Move `amount` from `from` to `to`; false if `from` cannot cover it */
  transfer(asset: string, from: string, to: string, amount: bigint): boolean;
  /** Spend `spender`'s allowance on `owner`; false if balance or allowance is short */
  transferFrom(asset: string, spender: string, owner: string, to: string, amount: bigint): boolean;
  mint(asset: string, to: string, amount: bigint): void;
  burn(asset: string, from: string, amount: bigint): void;
  /**
   * Mark the current state so an operation whose later steps fail can be
   * reverted. Every checkpoint must end in exactly one `restore` or `release`.
   */
  checkpoint(): LedgerCheckpoint;
}

export interface LedgerCheckpoint {
  /** Roll back every change made since the checkpoint was taken */
  restore(): void;
  /** Keep the changes and stop tracking them */
  release(): void;
}

interface AssetBook {
  totalSupply: bigint;
  balances: Map<string, bigint>;
  allowances: Map<string, Map<string, bigint>>;
}

function cloneBook(book: AssetBook): AssetBook {
  const allowances = new Map<string, Map<string, bigint>>();
  for (const [owner, spenders] of book.allowances) {
    allowances.set(owner, new Map(spenders));
  }
  return {
    totalSupply: book.totalSupply,
    balances: new Map(book.balances),
    allowances,
  };
}

// Asset id -> its book as of the checkpoint (undefined: it did not exist yet)
type Journal = Map<string, AssetBook | undefined>;

export class InMemoryLedger implements FungibleLedger {
  private readonly books = new Map<string, AssetBook>();
  private journals: Journal[] = [];

  /**
   * Book about to be written; open checkpoints save a copy of it first
   */
  private book(asset: string): AssetBook {
    for (const journal of this.journals) {
      if (!journal.has(asset)) {
        const current = this.books.get(asset);
        journal.set(asset, current ? cloneBook(current) : undefined);
      }
    }

    let book = this.books.get(asset);
    if (!book) {
      book = { totalSupply: 0n, balances: new Map(), allowances: new Map() };
      this.books.set(asset, book);
    }
    return book;
  }

  balanceOf(asset: string, holder: string): bigint {
    return this.books.get(asset)?.balances.get(holder) ?? 0n;
  }

  allowance(asset: string, owner: string, spender: string): bigint {
    return this.books.get(asset)?.allowances.get(owner)?.get(spender) ?? 0n;
  }

  totalSupply(asset: string): bigint {
    return this.books.get(asset)?.totalSupply ?? 0n;
  }

  approve(asset: string, owner: string, spender: string, amount: bigint): boolean {
    if (amount < 0n || amount > MAX_UINT256) return false;
    const book = this.book(asset);
    let spenders = book.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      book.allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
    return true;
  }

  transfer(asset: string, from: string, to: string, amount: bigint): boolean {
    if (amount < 0n) return false;
    const book = this.book(asset);
    const fromBalance = book.balances.get(from) ?? 0n;
    if (fromBalance < amount) return false;

    book.balances.set(from, fromBalance - amount);
    book.balances.set(to, (book.balances.get(to) ?? 0n) + amount);
    return true;
  }

  transferFrom(asset: string, spender: string, owner: string, to: string, amount: bigint): boolean {
    if (amount < 0n) return false;
    const current = this.allowance(asset, owner, spender);
    if (current < amount) return false;
    if (this.balanceOf(asset, owner) < amount) return false;

    // Infinite approvals are never decremented
    if (current !== MAX_UINT256) {
      this.approve(asset, owner, spender, current - amount);
    }
    return this.transfer(asset, owner, to, amount);
  }

  mint(asset: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`mint: negative amount ${amount}`);
    }
    const book = this.book(asset);
    if (book.totalSupply + amount > MAX_UINT256) {
      throw new Error(`mint: supply of ${asset} would exceed uint256`);
    }
    book.totalSupply += amount;
    book.balances.set(to, (book.balances.get(to) ?? 0n) + amount);
  }

  burn(asset: string, from: string, amount: bigint): void {
    const book = this.book(asset);
    const balance = book.balances.get(from) ?? 0n;
    if (amount < 0n || balance < amount) {
      throw new Error(`burn: ${from} holds ${balance} of ${asset}, cannot burn ${amount}`);
    }
    book.balances.set(from, balance - amount);
    book.totalSupply -= amount;
  }

  checkpoint(): LedgerCheckpoint {
    const journal: Journal = new Map();
    this.journals.push(journal);

    const close = (): number => {
      const index = this.journals.indexOf(journal);
      if (index === -1) {
        throw new Error("checkpoint: already restored or released");
      }
      return index;
    };

    return {
      restore: () => {
        // Later checkpoints only hold states newer than this one
        const index = close();
        this.journals = this.journals.slice(0, index);
        for (const [asset, book] of journal) {
          if (book) {
            this.books.set(asset, book);
          } else {
            this.books.delete(asset);
          }
        }
      },
      release: () => {
        const index = close();
        this.journals = this.journals.filter((_, i) => i !== index);
      },
    };
  }
}
