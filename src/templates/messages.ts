import type { RejectionReason } from '../common/errors';
import type { QuotaSettings } from '../config/settings';
import { BIO_MAX_LENGTH, FRONT_DOOR_DEEP_LINK_PREFIX, OWNER_CATEGORIES } from '../common/constants';
import type { OnboardingProblem, RegistrationMode } from '../services/onboarding.service';
import type { OnboardingStep, Owner } from '../types/relay.types';

export interface ForwardDetails {
  userName: string;
  username: string | null;
  text: string;
}

export const forwardText = ({ userName, username, text }: ForwardDetails): string => {
  const from = username ? `${userName} (@${username})` : userName;
  return `📩 New Message\n\nFrom: ${from}\nMessage: ${text}\n\nReply to this message to respond`;
};

export const replyText = (businessName: string | null, text: string): string =>
  `📬 Reply from ${businessName ?? 'the business'}:\n\n${text}`;

export const INTRO_MESSAGE = [
  '👋 Welcome!',
  '',
  'Through this bot you can message channel and business owners safely.',
  '',
  '1️⃣ If you came here through a business link, your messages go straight to that owner.',
  '2️⃣ The owner replies to you here, without seeing your personal details.'
].join('\n');

export const welcomeText = (businessName: string | null, bio: string | null): string => {
  const name = businessName ?? 'this business';
  const lines = [`💬 You are now chatting with ${name}.`];
  if (bio) {
    lines.push('', bio);
  }
  lines.push('', 'Send a message and the owner will reply here.');
  return lines.join('\n');
};

export const NO_OWNER_SELECTED = '👋 Welcome! Use a business link to start a conversation.';

export const TRIAL_ENDED_NOTICE = "⚠️ This bot's trial has ended.\n\nSubscription coming soon. Please wait for an update.";

export const MESSAGE_SENT = '✅ Message sent! The owner will reply soon.';
export const REPLY_SENT = '✅ Reply sent!';
export const DELIVERY_FAILED = '❌ Failed to deliver message. Please try again.';
export const REPLY_FAILED = '❌ Failed to send reply.';
export const REPLY_TARGET_UNKNOWN = '❓ Reply to a forwarded message to answer a user.';

const pad = (value: number): string => String(value).padStart(2, '0');

// User-facing text for a rejected message
export const rejectionText = (reason: RejectionReason, quota: QuotaSettings): string => {
  switch (reason) {
    case 'OwnerNotFound':
      return '❌ This business is no longer available.';
    case 'OwnerInactive':
      return '❌ This business is currently inactive.';
    case 'TrialExpired':
      return TRIAL_ENDED_NOTICE;
    case 'OutsideActiveWindow':
      return `⏰ Free mode is active only from ${pad(quota.startHour)}:00 to ${pad(quota.endHour)}:${pad(quota.endMinute)}.\n\nPlease try again during active hours!`;
    case 'DailyLimitReached':
      return `📫 You've reached your daily limit of ${quota.dailyLimit} messages.\n\nTry again tomorrow!`;
    case 'ConversationNotFound':
      return REPLY_TARGET_UNKNOWN;
    case 'StoreTimeout':
      return '⏳ We could not process your message right now. Please try again.';
  }
};

export const trialWarningText = (daysRemaining: number): string | null => {
  switch (daysRemaining) {
    case 7:
      return '⚠️ Trial Expiring Soon!\n\nYour free trial ends in 7 days.\n\nSubscription options coming soon!';
    case 1:
      return '🚨 Last Day of Trial!\n\nYour free trial ends tomorrow.\n\nAfter expiration, your bot will be paused.\nSubscription options coming soon!';
    default:
      return null;
  }
};

export const registrationText = (mode: RegistrationMode, quota: QuotaSettings, trialDays: number): string => {
  const intro = mode === 'dedicated'
    ? `🚀 Excellent choice!\n\nYour own bot is free for ${trialDays} days.`
    : `✅ Great choice!\n\nFree mode: ${quota.dailyLimit} messages per user per day, active ${pad(quota.startHour)}:00 to ${pad(quota.endHour)}:${pad(quota.endMinute)}.`;
  return `${intro}\n\n${onboardingPrompt('name')}`;
};

export const onboardingPrompt = (step: Exclude<OnboardingStep, 'done'>): string => {
  switch (step) {
    case 'name':
      return "📝 What's your business or channel name?";
    case 'category':
      return `📂 Pick a category: ${OWNER_CATEGORIES.join(', ')}`;
    case 'bio':
      return `📝 Write a short bio for your business (max ${BIO_MAX_LENGTH} characters):`;
    case 'logo':
      return '🖼 Upload your logo, or send /skip.';
    case 'token':
      return '🤖 Send your bot token.\n\n1️⃣ Open @BotFather\n2️⃣ Send /newbot\n3️⃣ Copy the token and paste it here\n\n⚠️ Keep your token private!';
  }
};

export const onboardingProblemText = (problem: OnboardingProblem): string => {
  switch (problem) {
    case 'NameLength':
      return '❌ Name must be 2-100 characters. Try again:';
    case 'UnknownCategory':
      return `❌ Pick one of: ${OWNER_CATEGORIES.join(', ')}`;
    case 'BioTooLong':
      return `❌ Bio too long! Keep it under ${BIO_MAX_LENGTH} characters:`;
    case 'LogoExpected':
      return '🖼 Send a photo for your logo, or /skip.';
    case 'InvalidCredential':
      return '❌ Invalid token! Please check and try again.';
    case 'TrialExpired':
      return TRIAL_ENDED_NOTICE;
  }
};

export const ALREADY_REGISTERED = '✅ You are already registered.';

export const shareLink = (botUsername: string, ownerId: number): string =>
  `https://t.me/${botUsername.replace(/^@/, '')}?start=${FRONT_DOOR_DEEP_LINK_PREFIX}${ownerId}`;

export const onboardingCompleteText = (owner: Owner, link: string): string => {
  const lines = ['🎉 Setup Complete!', '', `🏢 Business: ${owner.businessName ?? '-'}`, `📂 Category: ${owner.category ?? '-'}`];
  if (owner.mode.kind === 'dedicatedChannel' && owner.mode.botUsername) {
    lines.push(`🤖 Your Bot: @${owner.mode.botUsername}`);
  }
  lines.push('', `📤 Share this link:\n${link}`);
  return lines.join('\n');
};
