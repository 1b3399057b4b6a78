// Session typings for the per-session cart
// Ensure the module is resolvable for augmentation
import 'express-session';
import type { Cart } from '../pos/cart';

declare module 'express-session' {
  interface SessionData {
    cart?: Cart;
  }
}
