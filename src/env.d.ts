declare namespace NodeJS {
  interface ProcessEnv {
    TELEGRAM_BOT_TOKEN?: string;
    MONGODB_URI?: string;
    STORE_DRIVER?: string;
    GRACE_WINDOW_SECONDS?: string;
    REJECT_RATIO?: string;
    STREAK_BONUS_ENABLED?: string;
    SUMMARY_TIMEZONE?: string;
    DELIVERY_ATTEMPTS?: string;
    DELIVERY_RETRY_SECONDS?: string;
    WELLNESS_TIP_SHARE?: string;
  }
}
