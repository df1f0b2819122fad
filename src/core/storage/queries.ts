/**
 * SQL for PostgresChatStore. BIGINT columns come back from `pg` as strings and
 * are converted in the store; counts are cast to int here.
 */

// Local midnight in the zone given as $1
const START_OF_TODAY = `(date_trunc('day', NOW() AT TIME ZONE $1::text) AT TIME ZONE $1::text)`;

export const UPSERT_CHAT = `
  INSERT INTO chats (id, type, title, username)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (id) DO UPDATE SET
    type = EXCLUDED.type,
    title = EXCLUDED.title,
    username = EXCLUDED.username,
    last_updated_at = NOW()
`;

export const UPSERT_USER = `
  INSERT INTO users (id, is_bot, first_name, last_name, username, language_code, is_premium)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (id) DO UPDATE SET
    first_name = EXCLUDED.first_name,
    last_name = EXCLUDED.last_name,
    username = EXCLUDED.username,
    language_code = EXCLUDED.language_code,
    is_premium = EXCLUDED.is_premium,
    last_updated_at = NOW()
`;

// $12: replace the stored raw payload (edit events only)
export const UPSERT_MESSAGE = `
  INSERT INTO messages (
    chat_id, message_id, user_id, message_type, text, caption,
    reply_to_message_id, forward_from_chat_id, sent_at, edited_at, raw_message
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
  ON CONFLICT (chat_id, message_id) DO UPDATE SET
    text = EXCLUDED.text,
    caption = EXCLUDED.caption,
    edited_at = COALESCE(EXCLUDED.edited_at, messages.edited_at),
    raw_message = CASE WHEN $12::boolean THEN EXCLUDED.raw_message ELSE messages.raw_message END
`;

export const SELECT_CHAT = `
  SELECT id, type, title, username, first_seen_at, last_updated_at
  FROM chats
  WHERE id = $1
`;

export const SELECT_MESSAGE = `
  SELECT chat_id, message_id, user_id, message_type, text, caption,
         reply_to_message_id, forward_from_chat_id, sent_at, edited_at, raw_message
  FROM messages
  WHERE chat_id = $1 AND message_id = $2
`;

/**
 * Whole dashboard in one statement: grouped counts per chat, then per-chat
 * correlated lookups for the latest text message and the weekly top authors,
 * the latter folded into a JSON array.
 * $1 timezone, $2 contributor limit, $3 contributor window in days.
 */
export const DASHBOARD = `
  WITH stats AS (
    SELECT
      c.id,
      c.title,
      COUNT(m.message_id)::int AS total_messages,
      COUNT(m.message_id) FILTER (WHERE m.sent_at >= ${START_OF_TODAY})::int AS today_messages
    FROM chats c
    LEFT JOIN messages m ON m.chat_id = c.id
    GROUP BY c.id, c.title
  )
  SELECT
    s.id,
    s.title,
    s.total_messages,
    s.today_messages,
    lm.text AS last_text,
    lm.author AS last_author,
    lm.sent_at AS last_sent_at,
    COALESCE(tu.data, '[]'::json) AS top_contributors
  FROM stats s
  LEFT JOIN LATERAL (
    SELECT
      m.text,
      COALESCE(u.username, u.first_name, 'Unknown') AS author,
      m.sent_at
    FROM messages m
    LEFT JOIN users u ON u.id = m.user_id
    WHERE m.chat_id = s.id AND m.text IS NOT NULL
    ORDER BY m.sent_at DESC, m.message_id DESC
    LIMIT 1
  ) lm ON TRUE
  LEFT JOIN LATERAL (
    SELECT json_agg(
      json_build_object('userId', t.user_id, 'name', t.name, 'count', t.count)
      ORDER BY t.count DESC, t.user_id ASC
    ) AS data
    FROM (
      SELECT
        u.id AS user_id,
        COALESCE(u.username, u.first_name, 'Unknown') AS name,
        COUNT(*)::int AS count
      FROM messages m
      JOIN users u ON u.id = m.user_id
      WHERE m.chat_id = s.id
        AND m.sent_at >= NOW() - make_interval(days => $3::int)
      GROUP BY u.id, u.username, u.first_name
      ORDER BY count DESC, u.id ASC
      LIMIT $2
    ) t
  ) tu ON TRUE
  ORDER BY s.total_messages DESC, s.id ASC
`;

export const DIGEST_MESSAGES = `
  SELECT
    m.text,
    COALESCE(u.username, u.first_name, 'Unknown') AS author,
    m.sent_at
  FROM messages m
  LEFT JOIN users u ON u.id = m.user_id
  WHERE m.chat_id = $1
    AND m.sent_at >= $2
    AND m.text IS NOT NULL
  ORDER BY m.sent_at ASC, m.message_id ASC
  LIMIT $3
`;

// $2 days back, $3 limit; newest first so the cap keeps the latest messages
export const PERIOD_MESSAGES = `
  SELECT
    COALESCE(m.text, m.caption) AS text,
    COALESCE(u.username, u.first_name, 'Unknown') AS author,
    m.sent_at,
    m.message_type
  FROM messages m
  LEFT JOIN users u ON u.id = m.user_id
  WHERE m.chat_id = $1
    AND m.sent_at >= NOW() - make_interval(days => $2::int)
    AND (m.text IS NOT NULL OR m.caption IS NOT NULL)
  ORDER BY m.sent_at DESC, m.message_id DESC
  LIMIT $3
`;

export const OVERVIEW_STATS = `
  SELECT
    (SELECT COUNT(*) FROM chats)::int AS total_chats,
    (SELECT COUNT(*) FROM users)::int AS total_users,
    (SELECT COUNT(*) FROM messages)::int AS total_messages,
    (SELECT COUNT(*) FROM messages WHERE sent_at >= ${START_OF_TODAY})::int AS messages_today,
    COALESCE(
      (SELECT json_object_agg(k.message_type, k.cnt)
       FROM (SELECT message_type, COUNT(*)::int AS cnt FROM messages GROUP BY message_type) k),
      '{}'::json
    ) AS messages_by_kind
`;

export const LIST_CHATS = `
  SELECT
    c.id,
    c.type,
    c.title,
    c.username,
    COUNT(m.message_id)::int AS message_count,
    COUNT(DISTINCT m.user_id)::int AS user_count,
    MAX(m.sent_at) AS last_message_at,
    c.first_seen_at
  FROM chats c
  LEFT JOIN messages m ON m.chat_id = c.id
  GROUP BY c.id, c.type, c.title, c.username, c.first_seen_at
  ORDER BY message_count DESC, c.id ASC
`;

// $2 optional kind filter (NULL for all kinds)
export const LIST_MESSAGES = `
  SELECT
    m.message_id,
    m.message_type,
    m.text,
    m.caption,
    m.sent_at,
    m.edited_at,
    m.reply_to_message_id,
    u.id AS user_id,
    u.first_name,
    u.last_name,
    u.username
  FROM messages m
  LEFT JOIN users u ON u.id = m.user_id
  WHERE m.chat_id = $1
    AND ($2::text IS NULL OR m.message_type = $2::text)
  ORDER BY m.sent_at DESC, m.message_id DESC
  LIMIT $3 OFFSET $4
`;

// $2 timezone, $3 and $4 first and last local day
export const MESSAGES_BY_DATE = `
  SELECT
    m.message_id,
    m.message_type,
    m.text,
    m.caption,
    m.sent_at,
    m.edited_at,
    m.reply_to_message_id,
    u.id AS user_id,
    u.first_name,
    u.last_name,
    u.username
  FROM messages m
  LEFT JOIN users u ON u.id = m.user_id
  WHERE m.chat_id = $1
    AND (m.sent_at AT TIME ZONE $2::text)::date BETWEEN $3::date AND $4::date
  ORDER BY m.sent_at ASC, m.message_id ASC
`;

export const LIST_USERS = `
  SELECT
    u.id,
    u.first_name,
    u.last_name,
    u.username,
    u.is_bot,
    u.is_premium,
    u.language_code,
    u.first_seen_at,
    COUNT(m.message_id)::int AS message_count
  FROM users u
  LEFT JOIN messages m ON m.user_id = u.id
  GROUP BY u.id, u.first_name, u.last_name, u.username,
           u.is_bot, u.is_premium, u.language_code, u.first_seen_at
  ORDER BY message_count DESC, u.id ASC
  LIMIT $1 OFFSET $2
`;

// $2 timezone, $3 days back
export const DAILY_MESSAGE_COUNTS = `
  SELECT
    to_char((m.sent_at AT TIME ZONE $2::text)::date, 'YYYY-MM-DD') AS day,
    COUNT(*)::int AS count
  FROM messages m
  WHERE m.chat_id = $1
    AND m.sent_at >= NOW() - make_interval(days => $3::int)
  GROUP BY day
  ORDER BY day ASC
`;

export const DELETE_USER = `DELETE FROM users WHERE id = $1`;
export const DELETE_CHAT = `DELETE FROM chats WHERE id = $1`;
