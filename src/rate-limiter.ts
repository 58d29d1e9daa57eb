export interface AsyncRateLimiter {
  // 허용될 때까지 대기한 뒤 resolve 된다. 거절하지 않는다.
  acquire(): Promise<void>;
}
